import configuration, { parseProviderList } from './configuration';

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should apply defaults', () => {
    delete process.env.PORT;
    delete process.env.MARKET_PROVIDERS;
    delete process.env.MARKET_ALLOW_SIMULATED;
    delete process.env.SCREENER_CONCURRENCY;
    delete process.env.RULES_STRICT;

    const c = configuration();

    expect(c.port).toBe(4000);
    expect(c.market.providers).toEqual(['polygon']);
    expect(c.market.allowSimulated).toBe(true);
    expect(c.screener.concurrency).toBe(8);
    expect(c.rules.strict).toBe(false);
  });

  it('should read overrides from the environment', () => {
    process.env.MARKET_ALLOW_SIMULATED = 'off';
    process.env.RULES_STRICT = 'yes';
    process.env.SCREENER_CONCURRENCY = '3';

    const c = configuration();

    expect(c.market.allowSimulated).toBe(false);
    expect(c.rules.strict).toBe(true);
    expect(c.screener.concurrency).toBe(3);
  });

  it('should keep provider order and drop unknown names', () => {
    expect(parseProviderList('alpha_vantage, Polygon ,iex')).toEqual(['alpha_vantage', 'polygon']);
    expect(parseProviderList('')).toEqual([]);
  });
});
