import { SyntheticHistorySource, hashSymbol, seededRandom } from './synthetic.source';

describe('SyntheticHistorySource', () => {
  const source = new SyntheticHistorySource();

  it('should flag itself as simulated', () => {
    expect(source.name).toBe('synthetic');
    expect(source.simulated).toBe(true);
  });

  it('should list the seed universe in file order', async () => {
    const symbols = await source.listSymbols();
    expect(symbols).toHaveLength(16);
    expect(symbols[0]).toBe('000001');
  });

  it('should generate the same bars for the same symbol and window', async () => {
    const a = await source.getHistory('000001', '2024-03-01', '2024-03-29');
    const b = await source.getHistory('000001', '2024-03-01', '2024-03-29');
    expect(a).toEqual(b);
    expect(a.bars).toHaveLength(21);
    expect(a.bars[0].date).toBe('2024-03-01');
    expect(a.bars[20].date).toBe('2024-03-29');
  });

  it('should keep every bar inside its high-low range', async () => {
    const s = await source.getHistory('600519', '2024-01-01', '2024-06-30');
    for (const b of s.bars) {
      expect(b.high).toBeGreaterThanOrEqual(Math.max(b.open, b.close));
      expect(b.low).toBeLessThanOrEqual(Math.min(b.open, b.close));
      expect(b.volume).toBeGreaterThan(0);
    }
  });

  it('should serve seeded fundamentals', async () => {
    await expect(source.getProfile('000001')).resolves.toEqual({
      symbol: '000001',
      name: '平安银行',
      marketCap: 240000000000,
      pe: 6.5,
      pb: 0.8,
      floatShares: 15360000000,
    });
  });

  it('should derive fundamentals for an unknown symbol', async () => {
    const p = await source.getProfile('ZZZ');
    expect(p.name).toBeUndefined();
    expect(p.marketCap).toBeGreaterThanOrEqual(1e9);
    expect(p).toEqual(await source.getProfile('ZZZ'));
  });
});

describe('seeded helpers', () => {
  it('should hash with FNV-1a', () => {
    expect(hashSymbol('')).toBe(0x811c9dc5);
    expect(hashSymbol('a')).toBe(0xe40c292c);
  });

  it('should produce a repeatable sequence in [0, 1)', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    for (let i = 0; i < 50; i++) {
      const x = a();
      expect(x).toBe(b());
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });
});
