// api/src/indicators/features.utils.ts

import { Bar, StockProfile, TimeSeries } from '../market/market.models';
import { FEATURE_NAMES, FeatureName } from './feature-names';
import { FeatureSet, IndicatorBundle, IndicatorSeries, Value } from './indicator.models';
import {
  bollinger,
  ema,
  isValid,
  kdj,
  macd,
  rsi,
  sma,
  trailingRun,
} from './indicator.utils';

const VOLUME_RATIO_DAYS = 5;

const num = (x: number | undefined): Value => (isValid(x) ? x : null);

/**
 * Compute every indicator over the full series (uses ONLY history <= t at each t).
 */
export function computeIndicators(series: TimeSeries): IndicatorBundle {
  const closes = series.bars.map((b) => b.close);
  const highs = series.bars.map((b) => b.high);
  const lows = series.bars.map((b) => b.low);

  return {
    ma: {
      5: sma(closes, 5),
      10: sma(closes, 10),
      20: sma(closes, 20),
      30: sma(closes, 30),
      60: sma(closes, 60),
    },
    ema12: ema(closes, 12),
    ema26: ema(closes, 26),
    rsi: rsi(closes, 14),
    macd: macd(closes, 12, 26, 9),
    boll: bollinger(closes, 20, 2),
    kdj: kdj(highs, lows, closes, 9, 3, 3),
  };
}

/**
 * Latest feature snapshot for one stock. Fundamentals come from the profile;
 * anything that cannot be computed is null.
 */
export function buildFeatureSet(
  series: TimeSeries,
  profile?: StockProfile,
  bundle: IndicatorBundle = computeIndicators(series),
): FeatureSet {
  const bars = series.bars;
  const last = bars.length - 1;
  const bar: Bar | undefined = bars[last];
  const prev: Bar | undefined = bars[last - 1];

  const latest = (s: IndicatorSeries): Value => (last >= 0 ? s.values[last] ?? null : null);

  const price = num(bar?.close);
  const prevClose = num(prev?.close);
  const volume = num(bar?.volume);
  const high = num(bar?.high);
  const low = num(bar?.low);

  const pctChange =
    price != null && prevClose != null && prevClose !== 0
      ? (price / prevClose - 1) * 100
      : null;
  const amplitude =
    high != null && low != null && prevClose != null && prevClose !== 0
      ? ((high - low) / prevClose) * 100
      : null;

  // today's volume against the mean of the previous five sessions
  const prior = bars
    .slice(Math.max(0, last - VOLUME_RATIO_DAYS), Math.max(0, last))
    .map((b) => b.volume)
    .filter(isValid);
  const priorMean = prior.length ? prior.reduce((a, b) => a + b, 0) / prior.length : 0;
  const volumeRatio =
    volume != null && prior.length === VOLUME_RATIO_DAYS && priorMean > 0
      ? volume / priorMean
      : null;

  const floatShares = num(profile?.floatShares);
  const turnoverRate =
    volume != null && floatShares != null && floatShares > 0
      ? (volume / floatShares) * 100
      : null;

  const closes = bars.map((b) => b.close);
  const hasHistory = last >= 1;

  const values: Record<FeatureName, number | null> = {
    price,
    open: num(bar?.open),
    high,
    low,
    pct_change: pctChange,
    amplitude,
    volume,
    amount: num(bar?.amount),
    volume_ratio: volumeRatio,
    turnover_rate: turnoverRate,
    market_cap: num(profile?.marketCap),
    pe: num(profile?.pe),
    pb: num(profile?.pb),
    ma5: latest(bundle.ma[5]),
    ma10: latest(bundle.ma[10]),
    ma20: latest(bundle.ma[20]),
    ma30: latest(bundle.ma[30]),
    ma60: latest(bundle.ma[60]),
    ema12: latest(bundle.ema12),
    ema26: latest(bundle.ema26),
    rsi: latest(bundle.rsi),
    macd: latest(bundle.macd.line),
    macd_signal: latest(bundle.macd.signal),
    macd_hist: latest(bundle.macd.histogram),
    boll_upper: latest(bundle.boll.upper),
    boll_middle: latest(bundle.boll.middle),
    boll_lower: latest(bundle.boll.lower),
    kdj_k: latest(bundle.kdj.k),
    kdj_d: latest(bundle.kdj.d),
    kdj_j: latest(bundle.kdj.j),
    consecutive_up: hasHistory ? trailingRun(closes, 'up') : null,
    consecutive_down: hasHistory ? trailingRun(closes, 'down') : null,
  };

  const degradedBy: Partial<Record<FeatureName, IndicatorSeries>> = {
    ma5: bundle.ma[5],
    ma10: bundle.ma[10],
    ma20: bundle.ma[20],
    ma30: bundle.ma[30],
    ma60: bundle.ma[60],
    ema12: bundle.ema12,
    ema26: bundle.ema26,
    rsi: bundle.rsi,
    macd: bundle.macd.line,
    macd_signal: bundle.macd.signal,
    macd_hist: bundle.macd.histogram,
    boll_upper: bundle.boll.upper,
    boll_middle: bundle.boll.middle,
    boll_lower: bundle.boll.lower,
    kdj_k: bundle.kdj.k,
    kdj_d: bundle.kdj.d,
    kdj_j: bundle.kdj.j,
  };
  const degraded = FEATURE_NAMES.filter((f) => {
    const s = degradedBy[f];
    return s !== undefined && last >= 0 && s.degradedAt[last] && values[f] != null;
  });

  return {
    values: Object.freeze(values),
    degraded,
    missingBars: closes.filter((c) => !isValid(c)).length,
    asOf: bar?.date ?? null,
  };
}
