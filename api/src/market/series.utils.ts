// api/src/market/series.utils.ts

import { Bar, DateWindow, TimeSeries } from './market.models';

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 3600 * 1000;

export function isIsoDay(value: string): boolean {
  return ISO_DAY.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}

export function toIsoDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/**
 * Build a [start, end] window ending at `now` and reaching back `days` calendar days.
 * Explicit bounds win over the computed ones.
 */
export function toDateWindow(
  days: number,
  now: Date = new Date(),
  overrides: Partial<DateWindow> = {},
): DateWindow {
  const end = overrides.endDate ?? toIsoDay(now);
  const start =
    overrides.startDate ??
    toIsoDay(new Date(Date.parse(`${end}T00:00:00Z`) - days * DAY_MS));
  return { startDate: start, endDate: end };
}

/**
 * Monday..Friday between two ISO days, inclusive.
 */
export function businessDays(startDate: string, endDate: string): string[] {
  const out: string[] = [];
  const end = Date.parse(`${endDate}T00:00:00Z`);
  for (let t = Date.parse(`${startDate}T00:00:00Z`); t <= end; t += DAY_MS) {
    const dow = new Date(t).getUTCDay();
    if (dow !== 0 && dow !== 6) out.push(toIsoDay(new Date(t)));
  }
  return out;
}

/**
 * Sort bars by date and keep the last bar seen for a repeated date.
 * Providers occasionally return descending or overlapping pages.
 */
export function normalizeSeries(symbol: string, bars: readonly Bar[]): TimeSeries {
  const byDate = new Map<string, Bar>();
  for (const b of bars) {
    if (!isIsoDay(b.date)) continue;
    byDate.set(b.date, b);
  }
  const ordered = Array.from(byDate.keys())
    .sort()
    .map((d) => byDate.get(d))
    .filter((b): b is Bar => b !== undefined)
    .map((b) => Object.freeze({ ...b }));
  return Object.freeze({ symbol, bars: Object.freeze(ordered) });
}

/** Bars restricted to [startDate, endDate]. */
export function sliceWindow(series: TimeSeries, window: DateWindow): TimeSeries {
  const bars = series.bars.filter(
    (b) => b.date >= window.startDate && b.date <= window.endDate,
  );
  return Object.freeze({ symbol: series.symbol, bars: Object.freeze(bars) });
}

/** Parse a provider number; anything unusable becomes NaN (missing). */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}
