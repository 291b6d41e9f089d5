import { Injectable } from '@nestjs/common';
import seedUniverse from '../data/synthetic-universe.json';
import { Bar, StockProfile, TimeSeries } from '../market.models';
import { businessDays, normalizeSeries } from '../series.utils';
import { HistoryDataSource } from './history-source';

interface SeedStock {
  symbol: string;
  name: string;
  basePrice: number;
  marketCap: number;
  pe: number;
  pb: number;
}

const SEEDS: readonly SeedStock[] = seedUniverse;

/** FNV-1a, 32 bit. */
export function hashSymbol(symbol: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < symbol.length; i++) {
    h ^= symbol.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** mulberry32: small deterministic PRNG returning [0, 1). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const round2 = (x: number) => Math.round(x * 100) / 100;

/**
 * Deterministic stand-in for a market data provider.
 * Same symbol and window always produce the same bars, so simulated runs are reproducible.
 */
@Injectable()
export class SyntheticHistorySource implements HistoryDataSource {
  readonly name = 'synthetic';
  readonly simulated = true;

  async listSymbols(): Promise<string[]> {
    return SEEDS.map((s) => s.symbol);
  }

  async getHistory(
    symbol: string,
    startDate: string,
    endDate: string,
  ): Promise<TimeSeries> {
    const seed = this.seedFor(symbol);
    const rand = seededRandom(hashSymbol(`${symbol}:${startDate}`));
    const baseVolume = (seed.marketCap / seed.basePrice) * 0.004;

    const bars: Bar[] = [];
    let prevClose = seed.basePrice;
    for (const date of businessDays(startDate, endDate)) {
      // daily move within +-4%, slight upward drift
      const change = (rand() - 0.48) * 0.08;
      const open = prevClose * (1 + (rand() - 0.5) * 0.01);
      const close = Math.max(0.01, prevClose * (1 + change));
      const high = Math.max(open, close) * (1 + rand() * 0.015);
      const low = Math.min(open, close) * (1 - rand() * 0.015);
      const volume = Math.round(baseVolume * (0.6 + rand() * 0.8));

      bars.push({
        date,
        open: round2(open),
        high: round2(high),
        low: round2(low),
        close: round2(close),
        volume,
        amount: Math.round(volume * close),
      });
      prevClose = close;
    }
    return normalizeSeries(symbol, bars);
  }

  async getProfile(symbol: string): Promise<StockProfile> {
    const seed = this.seedFor(symbol);
    return {
      symbol,
      name: seed.name || undefined,
      marketCap: seed.marketCap,
      pe: seed.pe,
      pb: seed.pb,
      floatShares: Math.round((seed.marketCap / seed.basePrice) * 0.8),
    };
  }

  /** Known seeds come from the JSON list; anything else is derived from the symbol hash. */
  private seedFor(symbol: string): SeedStock {
    const known = SEEDS.find((s) => s.symbol === symbol);
    if (known) return known;

    const rand = seededRandom(hashSymbol(symbol));
    const basePrice = round2(5 + rand() * 45);
    return {
      symbol,
      name: '',
      basePrice,
      marketCap: Math.round((1e9 + rand() * 99e9) / 1e6) * 1e6,
      pe: round2(5 + rand() * 45),
      pb: round2(0.5 + rand() * 4.5),
    };
  }
}
