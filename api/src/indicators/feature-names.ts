// api/src/indicators/feature-names.ts

/** Moving-average windows computed for every stock. */
export const MA_WINDOWS = [5, 10, 20, 30, 60] as const;
export type MaWindow = (typeof MA_WINDOWS)[number];

/**
 * Every feature a rule may reference. Anything else is rejected before screening starts.
 */
export const FEATURE_NAMES = [
  'price',
  'open',
  'high',
  'low',
  'pct_change',
  'amplitude',
  'volume',
  'amount',
  'volume_ratio',
  'turnover_rate',
  'market_cap',
  'pe',
  'pb',
  'ma5',
  'ma10',
  'ma20',
  'ma30',
  'ma60',
  'ema12',
  'ema26',
  'rsi',
  'macd',
  'macd_signal',
  'macd_hist',
  'boll_upper',
  'boll_middle',
  'boll_lower',
  'kdj_k',
  'kdj_d',
  'kdj_j',
  'consecutive_up',
  'consecutive_down',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/** Features expressed in percent points (5 means 5%). */
export const PERCENT_FEATURES: ReadonlySet<FeatureName> = new Set<FeatureName>([
  'pct_change',
  'amplitude',
  'turnover_rate',
]);

const KNOWN: ReadonlySet<string> = new Set<string>(FEATURE_NAMES);

export function isFeatureName(name: string): name is FeatureName {
  return KNOWN.has(name);
}

/** Feature-set lookup; a missing key or null means unavailable. */
export type FeatureLookup = Readonly<Partial<Record<FeatureName, number | null>>>;
