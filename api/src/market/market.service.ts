import { Injectable, Inject, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import { ConfigService } from '@nestjs/config';
import { DataUnavailableError } from './market.errors';
import {
  DateWindow,
  HistoryResult,
  StockProfile,
  SymbolListResult,
} from './market.models';
import { HISTORY_SOURCES, HistoryDataSource } from './sources/history-source';
import { SyntheticHistorySource } from './sources/synthetic.source';
import { sliceWindow } from './series.utils';

const reason = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Ordered provider chain. Real sources are tried in configuration order; the
 * synthetic generator answers last (when allowed) and its results are flagged simulated.
 */
@Injectable()
export class MarketService {
  private readonly logger = new Logger(MarketService.name);
  private readonly allowSimulated: boolean;
  private readonly historyTtlMs: number;
  private readonly profileTtlMs: number;

  constructor(
    @Inject(HISTORY_SOURCES) private readonly sources: HistoryDataSource[],
    private readonly synthetic: SyntheticHistorySource,
    private readonly config: ConfigService,
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
  ) {
    this.allowSimulated = this.config.get<boolean>('market.allowSimulated') ?? true;
    this.historyTtlMs = (this.config.get<number>('cache.historyTtl') ?? 900) * 1000;
    this.profileTtlMs = (this.config.get<number>('cache.profileTtl') ?? 3600) * 1000;
  }

  /* ----------------------------- Public API ----------------------------- */

  get sourceNames(): string[] {
    return this.candidates().map((s) => s.name);
  }

  async listSymbols(): Promise<SymbolListResult> {
    const failures: string[] = [];
    for (const source of this.candidates()) {
      try {
        const symbols = await source.listSymbols();
        if (symbols.length) {
          return { symbols, source: source.name, simulated: source.simulated };
        }
        failures.push(`${source.name}: empty universe`);
      } catch (e) {
        failures.push(`${source.name}: ${reason(e)}`);
      }
    }
    this.logger.warn(`[symbols] no source answered (${failures.join('; ')})`);
    return { symbols: [], source: 'none', simulated: false };
  }

  async getHistory(symbol: string, window: DateWindow): Promise<HistoryResult> {
    const cacheKey = `history:${symbol}:${window.startDate}:${window.endDate}`;
    const hit = await this.cache.get<HistoryResult>(cacheKey);
    if (hit) return hit;

    const failures: string[] = [];
    for (const source of this.candidates()) {
      try {
        // providers may answer with bars outside the requested range
        const series = sliceWindow(
          await source.getHistory(symbol, window.startDate, window.endDate),
          window,
        );
        if (!series.bars.length) {
          failures.push(`${source.name}: no bars`);
          continue;
        }
        if (source.simulated && failures.length) {
          this.logger.warn(`[history] ${symbol} falling back to simulated data`);
        }
        const out: HistoryResult = {
          series,
          source: source.name,
          simulated: source.simulated,
        };
        await this.cache.set(cacheKey, out, this.historyTtlMs);
        return out;
      } catch (e) {
        failures.push(`${source.name}: ${reason(e)}`);
      }
    }

    throw new DataUnavailableError(
      symbol,
      `No history for ${symbol} (${failures.join('; ') || 'no sources configured'})`,
    );
  }

  /**
   * Fundamentals from the source that produced the history, so a real series is
   * never paired with simulated figures. Resolves undefined when that source has none.
   */
  async getProfile(symbol: string, sourceName: string): Promise<StockProfile | undefined> {
    const source = this.candidates().find((s) => s.name === sourceName);
    if (!source?.getProfile) return undefined;

    const cacheKey = `profile:${sourceName}:${symbol}`;
    const hit = await this.cache.get<StockProfile>(cacheKey);
    if (hit) return hit;

    try {
      const profile = await source.getProfile(symbol);
      await this.cache.set(cacheKey, profile, this.profileTtlMs);
      return profile;
    } catch (e) {
      this.logger.warn(`[profile] ${symbol} via ${sourceName} failed: ${reason(e)}`);
      return undefined;
    }
  }

  /* ------------------------------- Helpers ------------------------------ */

  private candidates(): HistoryDataSource[] {
    return this.allowSimulated ? [...this.sources, this.synthetic] : [...this.sources];
  }
}
