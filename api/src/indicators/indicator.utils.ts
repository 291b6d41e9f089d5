// api/src/indicators/indicator.utils.ts

import { IndicatorSeries, Value } from './indicator.models';

/** ---------- math helpers ---------- */

export const isValid = (x: Value | undefined): x is number =>
  typeof x === 'number' && Number.isFinite(x);

const mean = (xs: number[]) => xs.reduce((a, b) => a + b, 0) / xs.length;

const unavailable = (n: number): IndicatorSeries => ({
  values: new Array<Value>(n).fill(null),
  degraded: 0,
  degradedAt: new Array<boolean>(n).fill(false),
});

function markDegraded(s: IndicatorSeries, i: number): void {
  if (s.degradedAt[i]) return;
  s.degradedAt[i] = true;
  s.degraded++;
}

/** Point-wise union of the degraded flags of its inputs. */
function combined(values: Value[], ...inputs: IndicatorSeries[]): IndicatorSeries {
  const degradedAt = values.map((_, i) => inputs.some((s) => s.degradedAt[i]));
  return { values, degradedAt, degraded: degradedAt.filter(Boolean).length };
}

/** Valid inputs in values[end - w + 1 .. end]. */
function windowValues(values: readonly Value[], end: number, w: number): number[] {
  const out: number[] = [];
  for (let i = Math.max(0, end - w + 1); i <= end; i++) {
    const x = values[i];
    if (isValid(x)) out.push(x);
  }
  return out;
}

/** ---------- indicators ---------- */

/**
 * Simple moving average, defined from index w-1.
 * Missing inputs shrink the window population and mark the point degraded.
 */
export function sma(values: readonly Value[], w: number): IndicatorSeries {
  const n = values.length;
  const out = unavailable(n);
  if (w < 1 || w > n) return out;

  for (let i = w - 1; i < n; i++) {
    const win = windowValues(values, i, w);
    if (!win.length) continue;
    if (win.length < w) markDegraded(out, i);
    out.values[i] = mean(win);
  }
  return out;
}

/**
 * Exponential moving average seeded with the simple average of the first `span`
 * positions after the first available input.
 */
export function ema(values: readonly Value[], span: number): IndicatorSeries {
  const n = values.length;
  const out = unavailable(n);
  const first = values.findIndex(isValid);
  if (span < 1 || first < 0 || n - first < span) return out;

  const k = 2 / (span + 1);
  const seedAt = first + span - 1;
  const seed = windowValues(values, seedAt, span);
  if (seed.length < span) markDegraded(out, seedAt);

  let prev = mean(seed);
  out.values[seedAt] = prev;
  for (let i = seedAt + 1; i < n; i++) {
    const x = values[i];
    if (isValid(x)) prev = x * k + prev * (1 - k);
    else markDegraded(out, i);
    out.values[i] = prev;
  }
  return out;
}

const toRsi = (avgGain: number, avgLoss: number) =>
  avgLoss === 0 ? 100 : Math.min(100, Math.max(0, 100 - 100 / (1 + avgGain / avgLoss)));

/**
 * RSI with Wilder smoothing. First value at index w; needs w + 1 closes.
 */
export function rsi(closes: readonly Value[], w = 14): IndicatorSeries {
  const n = closes.length;
  const out = unavailable(n);
  if (w < 1 || n < w + 1) return out;

  const change = (i: number): number | null => {
    const a = closes[i - 1];
    const b = closes[i];
    return isValid(a) && isValid(b) ? b - a : null;
  };

  let gains = 0,
    losses = 0,
    count = 0;
  for (let i = 1; i <= w; i++) {
    const d = change(i);
    if (d == null) continue;
    count++;
    if (d >= 0) gains += d;
    else losses -= d;
  }
  if (!count) return out;
  if (count < w) markDegraded(out, w);

  let avgG = gains / count;
  let avgL = losses / count;
  out.values[w] = toRsi(avgG, avgL);

  for (let i = w + 1; i < n; i++) {
    const d = change(i);
    if (d == null) {
      markDegraded(out, i);
    } else {
      avgG = (avgG * (w - 1) + Math.max(d, 0)) / w;
      avgL = (avgL * (w - 1) + Math.max(-d, 0)) / w;
    }
    out.values[i] = toRsi(avgG, avgL);
  }
  return out;
}

/**
 * MACD line (fast EMA - slow EMA), its signal EMA and the histogram.
 */
export function macd(
  closes: readonly Value[],
  fast = 12,
  slow = 26,
  signal = 9,
): { line: IndicatorSeries; signal: IndicatorSeries; histogram: IndicatorSeries } {
  const f = ema(closes, fast);
  const s = ema(closes, slow);
  const line = combined(
    f.values.map((fv, i) => {
      const sv = s.values[i];
      return fv != null && sv != null ? fv - sv : null;
    }),
    f,
    s,
  );
  // the line has no gaps once seeded, so the signal inherits its flags
  const smoothed = ema(line.values, signal);
  const sig = combined(smoothed.values, smoothed, line);
  const histogram = combined(
    line.values.map((lv, i) => {
      const gv = sig.values[i];
      return lv != null && gv != null ? lv - gv : null;
    }),
    line,
    sig,
  );
  return { line, signal: sig, histogram };
}

/**
 * Bollinger bands: SMA(w) +- k population standard deviations.
 */
export function bollinger(
  closes: readonly Value[],
  w = 20,
  k = 2,
): { upper: IndicatorSeries; middle: IndicatorSeries; lower: IndicatorSeries } {
  const n = closes.length;
  const middle = sma(closes, w);
  const upper = unavailable(n);
  const lower = unavailable(n);
  upper.degraded = lower.degraded = middle.degraded;
  upper.degradedAt = [...middle.degradedAt];
  lower.degradedAt = [...middle.degradedAt];

  for (let i = 0; i < n; i++) {
    const m = middle.values[i];
    if (m == null) continue;
    const win = windowValues(closes, i, w);
    const variance = win.reduce((a, x) => a + (x - m) ** 2, 0) / win.length;
    const sd = Math.sqrt(variance);
    upper.values[i] = m + k * sd;
    lower.values[i] = m - k * sd;
  }
  return { upper, middle, lower };
}

/**
 * KDJ stochastic. RSV over the n-bar high/low range (50 on a flat range),
 * K and D smoothed from a 50 seed, J = 3K - 2D.
 */
export function kdj(
  highs: readonly Value[],
  lows: readonly Value[],
  closes: readonly Value[],
  n = 9,
  m1 = 3,
  m2 = 3,
): { k: IndicatorSeries; d: IndicatorSeries; j: IndicatorSeries } {
  const len = closes.length;
  const K = unavailable(len);
  const D = unavailable(len);
  const J = unavailable(len);
  if (n < 1 || len < n) return { k: K, d: D, j: J };

  let k = 50,
    d = 50,
    started = false;
  for (let i = n - 1; i < len; i++) {
    const hs = windowValues(highs, i, n);
    const ls = windowValues(lows, i, n);
    const c = closes[i];

    if (!hs.length || !ls.length || !isValid(c)) {
      if (!started) continue;
      for (const s of [K, D, J]) markDegraded(s, i);
    } else {
      if (hs.length < n || ls.length < n) for (const s of [K, D, J]) markDegraded(s, i);
      const hh = Math.max(...hs);
      const ll = Math.min(...ls);
      const rsv = hh === ll ? 50 : ((c - ll) / (hh - ll)) * 100;
      k = ((m1 - 1) * k + rsv) / m1;
      d = ((m2 - 1) * d + k) / m2;
      started = true;
    }
    K.values[i] = k;
    D.values[i] = d;
    J.values[i] = 3 * k - 2 * d;
  }
  return { k: K, d: D, j: J };
}

/**
 * Length of the run of strictly rising (or falling) closes ending at the last bar.
 * A missing close ends the run.
 */
export function trailingRun(closes: readonly Value[], direction: 'up' | 'down'): number {
  let run = 0;
  for (let i = closes.length - 1; i >= 1; i--) {
    const cur = closes[i];
    const prev = closes[i - 1];
    if (!isValid(cur) || !isValid(prev)) break;
    const moved = direction === 'up' ? cur > prev : cur < prev;
    if (!moved) break;
    run++;
  }
  return run;
}
