import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Bar, StockProfile, TimeSeries } from '../market.models';
import { normalizeSeries, toIsoDay, toNumber } from '../series.utils';
import { HistoryDataSource } from './history-source';
import { HttpHistorySource, ProviderError } from './http-source';

interface PolygonAgg {
  t: number;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  vw?: number;
}

interface PolygonAggsResponse {
  status?: string;
  results?: PolygonAgg[];
}

interface PolygonTickersResponse {
  results?: Array<{ ticker: string }>;
}

interface PolygonTickerDetailsResponse {
  results?: {
    ticker: string;
    name?: string;
    market_cap?: number;
    share_class_shares_outstanding?: number;
    weighted_shares_outstanding?: number;
  };
}

@Injectable()
export class PolygonHistorySource
  extends HttpHistorySource
  implements HistoryDataSource
{
  readonly name = 'polygon';
  private readonly universeLimit: number;

  constructor(http: HttpService, config: ConfigService) {
    super(
      http,
      config.get<string>('market.polygon.baseUrl') ?? 'https://api.polygon.io',
      config.get<string>('market.polygon.apiKey') ?? '',
      config.get<number>('market.timeoutMs') ?? 10_000,
      PolygonHistorySource.name,
    );
    this.universeLimit = config.get<number>('screener.maxUniverse') ?? 500;
  }

  async listSymbols(): Promise<string[]> {
    const url = this.url('/v3/reference/tickers', {
      market: 'stocks',
      active: 'true',
      order: 'asc',
      sort: 'ticker',
      limit: Math.min(this.universeLimit, 1000),
      apiKey: this.apiKey,
    });
    const r = await this.safeGet<PolygonTickersResponse>(url);
    const symbols = (r.results ?? []).map((x) => x.ticker);
    this.logger.log(`[symbols] ${symbols.length} tickers via polygon`);
    return symbols;
  }

  async getHistory(
    symbol: string,
    startDate: string,
    endDate: string,
  ): Promise<TimeSeries> {
    const url = this.url(
      `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/day/${startDate}/${endDate}`,
      { adjusted: 'true', sort: 'asc', limit: 50000, apiKey: this.apiKey },
    );

    const agg = await this.safeGet<PolygonAggsResponse>(url);
    const results = Array.isArray(agg.results) ? agg.results : [];

    const bars: Bar[] = results.map((r) => ({
      date: toIsoDay(new Date(r.t)),
      open: toNumber(r.o),
      high: toNumber(r.h),
      low: toNumber(r.l),
      close: toNumber(r.c),
      volume: toNumber(r.v),
      // polygon has no turnover value; approximate with the volume-weighted price
      amount: r.vw != null ? toNumber(r.vw) * toNumber(r.v) : Number.NaN,
    }));

    this.logger.debug(`[bars] ${symbol} ${startDate}..${endDate} -> ${bars.length} points via polygon`);
    return normalizeSeries(symbol, bars);
  }

  async getProfile(symbol: string): Promise<StockProfile> {
    const url = this.url(`/v3/reference/tickers/${encodeURIComponent(symbol)}`, {
      apiKey: this.apiKey,
    });
    const r = await this.safeGet<PolygonTickerDetailsResponse>(url);
    const d = r.results;
    if (!d) throw new ProviderError(this.name, `No reference data for ${symbol}`);

    return {
      symbol,
      name: d.name,
      marketCap: d.market_cap,
      floatShares: d.weighted_shares_outstanding ?? d.share_class_shares_outstanding,
    };
  }
}
