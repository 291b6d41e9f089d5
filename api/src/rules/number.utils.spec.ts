import { normalizeWidth, parseInteger, parseNumberLiteral } from './number.utils';

describe('number.utils', () => {
  describe('parseNumberLiteral', () => {
    it('should scale Chinese magnitude suffixes', () => {
      expect(parseNumberLiteral('200亿')).toEqual({
        value: 2e10,
        percent: false,
        magnitude: '亿',
        unit: null,
      });
      expect(parseNumberLiteral('1.5万亿')?.value).toBe(1.5e12);
      expect(parseNumberLiteral('3万')?.value).toBe(30000);
    });

    it('should flag percentages without scaling them', () => {
      expect(parseNumberLiteral('5%')).toEqual({
        value: 5,
        percent: true,
        magnitude: null,
        unit: null,
      });
      expect(parseNumberLiteral('3个百分点')?.percent).toBe(true);
    });

    it('should apply unit factors', () => {
      expect(parseNumberLiteral('10元')?.value).toBe(10);
      expect(parseNumberLiteral('2手')?.value).toBe(200);
      expect(parseNumberLiteral('-1.5')?.value).toBe(-1.5);
    });

    it('should return null for anything that is not a literal', () => {
      expect(parseNumberLiteral('abc')).toBeNull();
      expect(parseNumberLiteral('10元以上')).toBeNull();
    });
  });

  describe('parseInteger', () => {
    it('should read small Chinese integers', () => {
      expect(parseInteger('三')).toBe(3);
      expect(parseInteger('两')).toBe(2);
      expect(parseInteger('十五')).toBe(15);
      expect(parseInteger('二十')).toBe(20);
      expect(parseInteger('一百二十')).toBe(120);
    });

    it('should pass arabic digits through', () => {
      expect(parseInteger('12')).toBe(12);
    });

    it('should reject malformed numbers', () => {
      expect(parseInteger('三五')).toBeNull();
      expect(parseInteger('x')).toBeNull();
    });
  });

  describe('normalizeWidth', () => {
    it('should convert full-width digits and operators and drop whitespace', () => {
      expect(normalizeWidth('股价　＞　１０元，涨幅＞５％')).toBe('股价>10元,涨幅>5%');
      expect(normalizeWidth('RSI ≥ 30')).toBe('RSI>=30');
      expect(normalizeWidth('市盈率小于20。')).toBe('市盈率小于20;');
    });
  });
});
