// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.

export type MarketProviderName = 'polygon' | 'alpha_vantage';

const KNOWN_PROVIDERS: readonly MarketProviderName[] = ['polygon', 'alpha_vantage'];

function isProviderName(value: string): value is MarketProviderName {
  return KNOWN_PROVIDERS.some((p) => p === value);
}

/** Comma separated, order preserved, unknown names dropped. */
export function parseProviderList(raw: string | undefined): MarketProviderName[] {
  return (raw ?? 'polygon')
    .split(',')
    .map((p) => p.trim().toLowerCase())
    .filter(isProviderName);
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw == null || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export default () => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '4000', 10),

  market: {
    // tried in this order; the synthetic generator is always last
    providers: parseProviderList(process.env.MARKET_PROVIDERS),
    allowSimulated: parseBool(process.env.MARKET_ALLOW_SIMULATED, true),
    timeoutMs: parseInt(process.env.MARKET_TIMEOUT_MS ?? '10000', 10),
    polygon: {
      apiKey: process.env.POLYGON_API_KEY ?? '',
      baseUrl: process.env.POLYGON_BASE_URL ?? 'https://api.polygon.io',
    },
    alphaVantage: {
      apiKey: process.env.ALPHA_VANTAGE_API_KEY ?? '',
      baseUrl:
        process.env.ALPHA_VANTAGE_BASE_URL ?? 'https://www.alphavantage.co',
    },
  },

  cache: {
    // seconds
    historyTtl: parseInt(process.env.CACHE_TTL_HISTORY ?? '900', 10),
    profileTtl: parseInt(process.env.CACHE_TTL_PROFILE ?? '3600', 10),
  },

  screener: {
    concurrency: parseInt(process.env.SCREENER_CONCURRENCY ?? '8', 10),
    historyDays: parseInt(process.env.SCREENER_HISTORY_DAYS ?? '120', 10),
    maxUniverse: parseInt(process.env.SCREENER_MAX_UNIVERSE ?? '500', 10),
  },

  rules: {
    strict: parseBool(process.env.RULES_STRICT, false),
  },
});
