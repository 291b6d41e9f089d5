import { between, compare } from './predicate.models';
import { RULE_PATTERNS, matchClause, resolveField, withSubject } from './rule-patterns';
import { UnknownFieldError } from './rules.errors';

describe('rule patterns', () => {
  it('should resolve a plain numeric comparison', () => {
    expect(matchClause('股价大于10元')).toEqual({
      node: compare('price', '>', 10, '股价大于10元'),
      patternId: 'numeric_comparison',
      confidence: 1,
      rest: '',
    });
  });

  it('should read a percentage on a percentage field', () => {
    expect(matchClause('涨幅大于5%')).toEqual({
      node: compare('pct_change', '>', 5, '涨幅大于5%'),
      patternId: 'numeric_comparison',
      confidence: 1,
      rest: '',
    });
  });

  it('should scale a magnitude suffix', () => {
    const hit = matchClause('市值大于100亿');
    expect(hit).toEqual({
      node: compare('market_cap', '>', 1e10, '市值大于100亿'),
      patternId: 'numeric_comparison',
      confidence: 1,
      rest: '',
    });
  });

  it('should prefer moving-average crossings over generic comparisons', () => {
    expect(matchClause('股价站上20日均线')).toEqual({
      node: compare('price', '>', { feature: 'ma20' }, '股价站上20日均线'),
      patternId: 'ma_cross_above',
      confidence: 1,
      rest: '',
    });
    expect(matchClause('跌破MA60')).toEqual({
      node: compare('price', '<', { feature: 'ma60' }, '跌破MA60'),
      patternId: 'ma_cross_below',
      confidence: 1,
      rest: '',
    });
  });

  it('should fail on a moving average outside the feature set', () => {
    expect(() => matchClause('站上120日均线')).toThrow(UnknownFieldError);
    expect(() => matchClause('站上120日均线')).toThrow('Unknown field "ma120"');
  });

  it('should read consecutive moves with Chinese counts', () => {
    expect(matchClause('连续3天上涨')).toEqual({
      node: compare('consecutive_up', '>=', 3, '连续3天上涨'),
      patternId: 'consecutive_up',
      confidence: 1,
      rest: '',
    });
    expect(matchClause('连续三天下跌')).toEqual({
      node: compare('consecutive_down', '>=', 3, '连续三天下跌'),
      patternId: 'consecutive_down',
      confidence: 1,
      rest: '',
    });
  });

  it('should turn a decline into a negative change', () => {
    expect(matchClause('跌幅大于3%')).toEqual({
      node: compare('pct_change', '<', -3, '跌幅大于3%'),
      patternId: 'decline',
      confidence: 1,
      rest: '',
    });
    expect(matchClause('涨跌幅大于2')).toEqual({
      node: compare('pct_change', '>', 2, '涨跌幅大于2'),
      patternId: 'numeric_comparison',
      confidence: 1,
      rest: '',
    });
  });

  it('should read ranges and share the magnitude of the upper bound', () => {
    expect(matchClause('RSI在30到70之间')).toEqual({
      node: between('rsi', 30, 70, 'RSI在30到70之间'),
      patternId: 'range',
      confidence: 1,
      rest: '',
    });
    expect(matchClause('市值在100到500亿之间')).toEqual({
      node: between('market_cap', 1e10, 5e10, '市值在100到500亿之间'),
      patternId: 'range',
      confidence: 1,
      rest: '',
    });
    expect(matchClause('市盈率在30-10')).toEqual({
      node: between('pe', 10, 30, '市盈率在30-10'),
      patternId: 'range',
      confidence: 1,
      rest: '',
    });
  });

  it('should compare two features', () => {
    expect(matchClause('股价高于布林上轨')).toEqual({
      node: compare('price', '>', { feature: 'boll_upper' }, '股价高于布林上轨'),
      patternId: 'field_vs_field',
      confidence: 1,
      rest: '',
    });
    expect(matchClause('MA5大于MA10')).toEqual({
      node: compare('ma5', '>', { feature: 'ma10' }, 'MA5大于MA10'),
      patternId: 'field_vs_field',
      confidence: 1,
      rest: '',
    });
  });

  it('should expand concept words', () => {
    expect(matchClause('大盘股')).toEqual({
      node: compare('market_cap', '>', 5e10, '大盘股'),
      patternId: 'concept',
      confidence: 0.8,
      rest: '',
    });
    expect(matchClause('中价股')).toEqual({
      node: between('price', 10, 50, '中价股'),
      patternId: 'concept',
      confidence: 0.8,
      rest: '',
    });
  });

  it('should reject a negated concept', () => {
    expect(matchClause('非大盘股')).toEqual({ reason: 'negated concept 大盘股' });
    expect(matchClause('不是低价股')).toEqual({ reason: 'negated concept 低价股' });
  });

  it('should return the text a pattern leaves behind', () => {
    expect(matchClause('涨幅大于5%放量')).toEqual({
      node: compare('pct_change', '>', 5, '涨幅大于5%放量'),
      patternId: 'numeric_comparison',
      confidence: 1,
      rest: '放量',
    });
  });

  it('should not count range words or units as leftover text', () => {
    const hit = matchClause('市值在100到500亿之间的');
    expect('rest' in hit && hit.rest).toBe('');
  });

  it('should lend the previous field to a clause that opens with an operator', () => {
    expect(withSubject('低于100元', '股价高于20元')).toBe('股价低于100元');
    expect(withSubject('低于100元', undefined)).toBe('低于100元');
    expect(withSubject('市盈率低于20', '股价高于20元')).toBe('市盈率低于20');
    expect(withSubject('低于100元', '大盘股')).toBe('低于100元');
  });

  it('should read a bare trend word', () => {
    expect(matchClause('上涨')).toEqual({
      node: compare('pct_change', '>', 0, '上涨'),
      patternId: 'trend_up',
      confidence: 0.7,
      rest: '',
    });
  });

  it('should reject a percent sign on a non-percentage field', () => {
    expect(matchClause('市盈率大于5%')).toEqual({
      reason: 'percentage given for non-percentage field pe',
    });
  });

  it('should report no reason when nothing matched', () => {
    expect(matchClause('火星连接')).toEqual({ reason: null });
  });

  it('should be case-insensitive on Latin field names', () => {
    expect(resolveField('rsi')).toBe('rsi');
    expect(resolveField('ma5')).toBe('ma5');
    expect(resolveField('二十日线')).toBe('ma20');
  });

  it('should be an immutable catalogue with unique ids', () => {
    const ids = RULE_PATTERNS.map((p) => p.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(Object.isFrozen(RULE_PATTERNS)).toBe(true);
  });

  it('should match every catalogue example with its own pattern', () => {
    for (const p of RULE_PATTERNS) {
      const hit = matchClause(p.example);
      expect('patternId' in hit && hit.patternId).toBe(p.id);
      expect('rest' in hit && hit.rest).toBe('');
    }
  });
});
