// api/src/market/market.models.ts

/**
 * One daily bar. Dates are exchange-local calendar days ("2025-10-03").
 * A non-finite number (NaN) marks a value the provider did not deliver.
 */
export interface Bar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  amount: number;
}

/**
 * Daily history for one symbol.
 * Bars are strictly increasing by date with no duplicates.
 */
export interface TimeSeries {
  readonly symbol: string;
  readonly bars: readonly Bar[];
}

/** Fundamentals the screener can compare against; absent fields are unavailable. */
export interface StockProfile {
  symbol: string;
  name?: string;
  marketCap?: number;
  pe?: number;
  pb?: number;
  floatShares?: number;
}

export interface HistoryResult {
  series: TimeSeries;
  source: string;
  simulated: boolean;
}

export interface SymbolListResult {
  symbols: string[];
  source: string;
  simulated: boolean;
}

export interface DateWindow {
  startDate: string;
  endDate: string;
}
