import { StockProfile, TimeSeries } from '../market.models';

/** DI token for the ordered list of real providers. */
export const HISTORY_SOURCES = Symbol('HISTORY_SOURCES');

/**
 * A provider of daily stock history.
 * Implementations reject when they cannot answer; the market service decides what to try next.
 */
export interface HistoryDataSource {
  readonly name: string;
  readonly simulated: boolean;

  listSymbols(): Promise<string[]>;

  getHistory(symbol: string, startDate: string, endDate: string): Promise<TimeSeries>;

  getProfile?(symbol: string): Promise<StockProfile>;
}
