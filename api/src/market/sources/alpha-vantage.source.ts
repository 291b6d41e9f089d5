import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Bar, StockProfile, TimeSeries } from '../market.models';
import { normalizeSeries, toNumber } from '../series.utils';
import { HistoryDataSource } from './history-source';
import { HttpHistorySource, ProviderError } from './http-source';

type DailyRow = Record<'1. open' | '2. high' | '3. low' | '4. close' | '5. volume', string>;

interface DailyResponse {
  'Time Series (Daily)'?: Record<string, DailyRow>;
  'Error Message'?: string;
  Note?: string;
  Information?: string;
}

interface OverviewResponse {
  Symbol?: string;
  Name?: string;
  MarketCapitalization?: string;
  PERatio?: string;
  PriceToBookRatio?: string;
  SharesFloat?: string;
}

const optional = (raw: string | undefined): number | undefined => {
  const n = toNumber(raw);
  return Number.isFinite(n) ? n : undefined;
};

@Injectable()
export class AlphaVantageHistorySource
  extends HttpHistorySource
  implements HistoryDataSource
{
  readonly name = 'alpha_vantage';

  constructor(http: HttpService, config: ConfigService) {
    super(
      http,
      config.get<string>('market.alphaVantage.baseUrl') ??
        'https://www.alphavantage.co',
      config.get<string>('market.alphaVantage.apiKey') ?? '',
      config.get<number>('market.timeoutMs') ?? 10_000,
      AlphaVantageHistorySource.name,
    );
  }

  /** The listing endpoint is CSV only; let the next source answer. */
  async listSymbols(): Promise<string[]> {
    throw new ProviderError(this.name, 'Symbol listing is not supported');
  }

  async getHistory(
    symbol: string,
    startDate: string,
    endDate: string,
  ): Promise<TimeSeries> {
    const url = this.url('/query', {
      function: 'TIME_SERIES_DAILY',
      symbol,
      outputsize: 'full',
      apikey: this.apiKey,
    });
    const r = await this.safeGet<DailyResponse>(url);

    const rows = r['Time Series (Daily)'];
    if (!rows) {
      // rate limit and bad symbol both come back as 200 with a message
      const reason = r['Error Message'] ?? r.Note ?? r.Information ?? 'empty response';
      throw new ProviderError(this.name, `${symbol}: ${reason}`);
    }

    const bars: Bar[] = Object.entries(rows)
      .filter(([date]) => date >= startDate && date <= endDate)
      .map(([date, row]) => {
        const close = toNumber(row['4. close']);
        const volume = toNumber(row['5. volume']);
        return {
          date,
          open: toNumber(row['1. open']),
          high: toNumber(row['2. high']),
          low: toNumber(row['3. low']),
          close,
          volume,
          amount: close * volume,
        };
      });

    return normalizeSeries(symbol, bars);
  }

  async getProfile(symbol: string): Promise<StockProfile> {
    const url = this.url('/query', {
      function: 'OVERVIEW',
      symbol,
      apikey: this.apiKey,
    });
    const r = await this.safeGet<OverviewResponse>(url);
    if (!r.Symbol) throw new ProviderError(this.name, `No overview for ${symbol}`);

    return {
      symbol,
      name: r.Name,
      marketCap: optional(r.MarketCapitalization),
      pe: optional(r.PERatio),
      pb: optional(r.PriceToBookRatio),
      floatShares: optional(r.SharesFloat),
    };
  }
}
