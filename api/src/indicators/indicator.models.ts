// api/src/indicators/indicator.models.ts

import { FeatureName, MaWindow } from './feature-names';

/** null = unavailable (not enough history, or no valid input in the window). */
export type Value = number | null;

/**
 * Output aligned one-to-one with the input bars.
 */
export interface IndicatorSeries {
  values: Value[];
  /** points computed over fewer valid inputs than the window asks for */
  degraded: number;
  /** per point: computed over a reduced window, or carried over a missing input */
  degradedAt: boolean[];
}

export interface IndicatorBundle {
  ma: Record<MaWindow, IndicatorSeries>;
  ema12: IndicatorSeries;
  ema26: IndicatorSeries;
  rsi: IndicatorSeries;
  macd: { line: IndicatorSeries; signal: IndicatorSeries; histogram: IndicatorSeries };
  boll: { upper: IndicatorSeries; middle: IndicatorSeries; lower: IndicatorSeries };
  kdj: { k: IndicatorSeries; d: IndicatorSeries; j: IndicatorSeries };
}

/**
 * Latest value of every feature for one stock, computed per screening run.
 */
export interface FeatureSet {
  values: Readonly<Record<FeatureName, number | null>>;
  /** features whose latest value was computed over a reduced window */
  degraded: FeatureName[];
  /** bars with no usable close */
  missingBars: number;
  /** date of the last bar, null for an empty series */
  asOf: string | null;
}

/**
 * Single-issue analysis: full indicator history plus the latest feature snapshot.
 */
export interface IndicatorReport {
  symbol: string;
  name?: string;
  source: string;
  simulated: boolean;
  dates: string[];
  closes: Value[];
  indicators: IndicatorBundle;
  features: FeatureSet;
}
