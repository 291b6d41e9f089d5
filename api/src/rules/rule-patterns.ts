// api/src/rules/rule-patterns.ts

import {
  FeatureName,
  PERCENT_FEATURES,
  isFeatureName,
} from '../indicators/feature-names';
import {
  CN_INTEGER_SOURCE,
  MAGNITUDES,
  NUMBER_SOURCE,
  NumericLiteral,
  literalFromGroups,
  parseInteger,
} from './number.utils';
import {
  Comparison,
  ScalarOperator,
  between,
  compare,
} from './predicate.models';
import { UnknownFieldError } from './rules.errors';

/**
 * One entry of the catalogue. `build` returns the comparison, or a reason why the
 * match cannot be used (the parser then tries the next pattern).
 */
export interface RulePattern {
  readonly id: string;
  readonly regex: RegExp;
  readonly example: string;
  /** 1 for an explicit comparison, lower for vague wording */
  readonly confidence: number;
  build(match: RegExpExecArray, clause: string): Comparison | string;
}

export interface ClauseMatch {
  node: Comparison;
  patternId: string;
  confidence: number;
  /** clause text the pattern did not consume, decoration removed */
  rest: string;
}

/* ------------------------------ vocabulary ----------------------------- */

const FIELD_ALIASES: ReadonlyArray<readonly [FeatureName, readonly string[]]> = [
  ['price', ['股价', '价格', '收盘价', '现价', '最新价', '股票价格']],
  ['open', ['开盘价']],
  ['high', ['最高价']],
  ['low', ['最低价']],
  ['pct_change', ['涨跌幅', '涨幅度', '涨幅', '涨跌']],
  ['amplitude', ['振幅']],
  ['volume', ['成交量', '交易量']],
  ['amount', ['成交额', '成交金额', '交易额']],
  ['volume_ratio', ['量比']],
  ['turnover_rate', ['换手率']],
  ['market_cap', ['总市值', '流通市值', '市值']],
  ['pe', ['动态市盈率', '市盈率', 'PE']],
  ['pb', ['市净率', 'PB']],
  ['ema12', ['EMA12']],
  ['ema26', ['EMA26']],
  ['rsi', ['RSI', '相对强弱指数', '强弱指标']],
  ['macd_hist', ['MACD柱']],
  ['macd_signal', ['DEA', 'MACD信号线']],
  ['macd', ['MACD', 'DIF']],
  ['boll_upper', ['布林上轨', '布林线上轨', '上轨']],
  ['boll_middle', ['布林中轨', '布林线中轨', '中轨']],
  ['boll_lower', ['布林下轨', '布林线下轨', '下轨']],
  ['kdj_k', ['K值']],
  ['kdj_d', ['D值']],
  ['kdj_j', ['J值']],
];

const ALIAS_TO_FIELD = new Map<string, FeatureName>(
  FIELD_ALIASES.flatMap(([field, aliases]) =>
    aliases.map((a): [string, FeatureName] => [a.toUpperCase(), field]),
  ),
);

const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const byLengthDesc = (a: string, b: string) => b.length - a.length;

/** Moving-average names: MA20, 20日均线, 二十日线. */
const MA_SOURCE = `MA\\d+|(?:\\d+|${CN_INTEGER_SOURCE})[日天](?:均线|线)`;

const FIELD_SOURCE = `(${MA_SOURCE}|${Array.from(ALIAS_TO_FIELD.keys())
  .sort(byLengthDesc)
  .map(escape)
  .join('|')})`;

const OPERATOR_WORDS: ReadonlyArray<readonly [ScalarOperator, readonly string[]]> = [
  ['>=', ['大于等于', '不低于', '不少于', '不小于', '至少', '>=']],
  ['<=', ['小于等于', '不高于', '不超过', '不大于', '至多', '<=']],
  ['>', ['大于', '高于', '超过', '多于', '高出', '超越', '>']],
  ['<', ['小于', '低于', '少于', '不足', '<']],
  ['==', ['等于', '==', '=']],
];

const WORD_TO_OPERATOR = new Map<string, ScalarOperator>(
  OPERATOR_WORDS.flatMap(([op, words]) =>
    words.map((w): [string, ScalarOperator] => [w, op]),
  ),
);

const OPERATOR_SOURCE = `(${Array.from(WORD_TO_OPERATOR.keys())
  .sort(byLengthDesc)
  .map(escape)
  .join('|')})`;

/** "要", "需要" ... between a field and its operator. */
const MODAL = '(?:要|需要|应该|应当|必须)?';

const MIRROR: Readonly<Record<ScalarOperator, ScalarOperator>> = {
  '>': '<',
  '<': '>',
  '>=': '<=',
  '<=': '>=',
  '==': '==',
};

/* ------------------------------- helpers ------------------------------- */

/**
 * Resolve a field token to a feature, failing fast on names outside the catalogue.
 */
export function resolveField(token: string): FeatureName {
  const ma = /^MA(\d+)$/i.exec(token) ?? new RegExp(`^(\\d+|${CN_INTEGER_SOURCE})[日天]`).exec(token);
  if (ma) {
    const n = parseInteger(ma[1]);
    const name = `ma${n ?? ma[1]}`;
    if (!isFeatureName(name)) throw new UnknownFieldError(name);
    return name;
  }
  const field = ALIAS_TO_FIELD.get(token.toUpperCase());
  if (!field) throw new UnknownFieldError(token);
  return field;
}

export function resolveOperator(word: string): ScalarOperator {
  const op = WORD_TO_OPERATOR.get(word);
  if (!op) throw new Error(`Unmapped operator word "${word}"`);
  return op;
}

/**
 * A percent sign is only meaningful on percentage features; a magnitude never is.
 */
export function valueFor(field: FeatureName, lit: NumericLiteral): number | string {
  const percentField = PERCENT_FEATURES.has(field);
  if (lit.percent && !percentField) {
    return `percentage given for non-percentage field ${field}`;
  }
  if (percentField && lit.magnitude) {
    return `magnitude ${lit.magnitude} given for percentage field ${field}`;
  }
  return lit.value;
}

const group = (m: RegExpExecArray, i: number): string => m[i] ?? '';

/** "100到500亿": a bare lower bound takes the upper bound's magnitude and percent sign. */
function inheritScale(low: NumericLiteral, high: NumericLiteral): NumericLiteral {
  if (low.magnitude || low.percent || !(high.magnitude || high.percent)) return low;
  const factor = MAGNITUDES.find(([m]) => m === high.magnitude)?.[1] ?? 1;
  return { ...low, value: low.value * factor, magnitude: high.magnitude, percent: high.percent };
}

/* ------------------------------ catalogue ------------------------------ */

const maCross = (id: string, words: string, operator: ScalarOperator, example: string): RulePattern => ({
  id,
  example,
  confidence: 1,
  regex: new RegExp(`(?:股价|价格|收盘价)?(?:${words})(${MA_SOURCE})`, 'i'),
  build: (m, clause) => compare('price', operator, { feature: resolveField(group(m, 1)) }, clause),
});

const consecutive = (id: string, words: string, field: FeatureName, example: string): RulePattern => ({
  id,
  example,
  confidence: 1,
  regex: new RegExp(`连续(\\d+|${CN_INTEGER_SOURCE})(?:个)?(?:交易日|天|日)(?:${words})`),
  build: (m, clause) => {
    const n = parseInteger(group(m, 1));
    if (n == null || n < 1) return `invalid day count "${group(m, 1)}"`;
    return compare(field, '>=', n, clause);
  },
});

type ConceptDef =
  | { field: FeatureName; operator: ScalarOperator; value: number }
  | { field: FeatureName; operator: 'between'; low: number; high: number };

/** Vague everyday terms with a fixed meaning. */
const CONCEPTS: Readonly<Record<string, ConceptDef>> = {
  大盘股: { field: 'market_cap', operator: '>', value: 5e10 },
  中盘股: { field: 'market_cap', operator: 'between', low: 1e10, high: 5e10 },
  小盘股: { field: 'market_cap', operator: '<', value: 1e10 },
  高价股: { field: 'price', operator: '>', value: 50 },
  中价股: { field: 'price', operator: 'between', low: 10, high: 50 },
  低价股: { field: 'price', operator: '<', value: 10 },
  活跃股: { field: 'turnover_rate', operator: '>', value: 5 },
  价值股: { field: 'pb', operator: '<', value: 2 },
  成长股: { field: 'pe', operator: 'between', low: 15, high: 40 },
  表现好: { field: 'pct_change', operator: '>', value: 3 },
  超买: { field: 'rsi', operator: '>', value: 70 },
  超卖: { field: 'rsi', operator: '<', value: 30 },
  放量: { field: 'volume_ratio', operator: '>', value: 1.5 },
  缩量: { field: 'volume_ratio', operator: '<', value: 0.8 },
};

/** 非大盘股, 不是低价股, 排除小盘股: a concept has no inverse, so these are rejected. */
const NEGATED = /(?:不是|不要|不|非|无|没有|排除|避免)$/;

function conceptNode(word: string, clause: string): Comparison | string {
  const def = CONCEPTS[word];
  if (!def) return `unknown concept ${word}`;
  return def.operator === 'between'
    ? between(def.field, def.low, def.high, clause)
    : compare(def.field, def.operator, def.value, clause);
}

/**
 * Ordered, most specific first. The first pattern that yields a comparison wins.
 */
export const RULE_PATTERNS: readonly RulePattern[] = Object.freeze([
  maCross('ma_cross_above', '站上|站稳|突破|上穿', '>', '股价站上20日均线'),
  maCross('ma_cross_below', '跌破|下穿|失守', '<', '股价跌破60日均线'),

  consecutive('consecutive_up', '上涨|收涨|收阳|涨', 'consecutive_up', '连续3天上涨'),
  consecutive('consecutive_down', '下跌|收跌|收阴|跌', 'consecutive_down', '连续三天下跌'),

  {
    // 跌幅大于3% means pct_change < -3; 涨跌幅 is an ordinary field
    id: 'decline',
    example: '跌幅大于3%',
    confidence: 1,
    regex: new RegExp(`(?<!涨)跌幅(?:度)?${MODAL}${OPERATOR_SOURCE}${NUMBER_SOURCE}`),
    build: (m, clause) => {
      const lit = literalFromGroups(m, 2);
      if (!lit) return 'missing number';
      const v = valueFor('pct_change', lit);
      if (typeof v === 'string') return v;
      return compare('pct_change', MIRROR[resolveOperator(group(m, 1))], -v, clause);
    },
  },

  {
    id: 'range',
    example: 'RSI在30到70之间',
    confidence: 1,
    regex: new RegExp(
      `${FIELD_SOURCE}(?:在|介于|处于|从)?${NUMBER_SOURCE}(?:到|至|-|~|和)${NUMBER_SOURCE}(?:之间|范围内|范围|区间)?`,
      'i',
    ),
    build: (m, clause) => {
      const field = resolveField(group(m, 1));
      const a = literalFromGroups(m, 2);
      const b = literalFromGroups(m, 6);
      if (!a || !b) return 'missing bound';
      const low = inheritScale(a, b);
      const lv = valueFor(field, low);
      const hv = valueFor(field, b);
      if (typeof lv === 'string') return lv;
      if (typeof hv === 'string') return hv;
      return between(field, Math.min(lv, hv), Math.max(lv, hv), clause);
    },
  },

  {
    id: 'field_vs_field',
    example: '股价高于布林上轨',
    confidence: 1,
    regex: new RegExp(`${FIELD_SOURCE}${MODAL}${OPERATOR_SOURCE}${FIELD_SOURCE}`, 'i'),
    build: (m, clause) =>
      compare(
        resolveField(group(m, 1)),
        resolveOperator(group(m, 2)),
        { feature: resolveField(group(m, 3)) },
        clause,
      ),
  },

  {
    id: 'numeric_comparison',
    example: '股价大于10元',
    confidence: 1,
    regex: new RegExp(`${FIELD_SOURCE}${MODAL}${OPERATOR_SOURCE}${NUMBER_SOURCE}`, 'i'),
    build: (m, clause) => {
      const field = resolveField(group(m, 1));
      const lit = literalFromGroups(m, 3);
      if (!lit) return 'missing number';
      const v = valueFor(field, lit);
      if (typeof v === 'string') return v;
      return compare(field, resolveOperator(group(m, 2)), v, clause);
    },
  },

  {
    id: 'concept',
    example: '大盘股',
    confidence: 0.8,
    regex: new RegExp(`(${Object.keys(CONCEPTS).sort(byLengthDesc).join('|')})`),
    build: (m, clause) =>
      NEGATED.test(clause.slice(0, m.index))
        ? `negated concept ${group(m, 1)}`
        : conceptNode(group(m, 1), clause),
  },

  {
    id: 'trend_up',
    example: '上涨',
    confidence: 0.7,
    regex: /^(?:上涨|收涨|涨幅为正|红盘|收红)$/,
    build: (_m, clause) => compare('pct_change', '>', 0, clause),
  },
  {
    id: 'trend_down',
    example: '下跌',
    confidence: 0.7,
    regex: /^(?:下跌|收跌|涨幅为负|绿盘|收绿)$/,
    build: (_m, clause) => compare('pct_change', '<', 0, clause),
  },
]);

/** Text a pattern may leave behind without changing the meaning. */
const DECORATION = /^(?:之间|范围内|范围|区间|的|元|块钱|块)*$/;

const SUBJECT = new RegExp(`^${FIELD_SOURCE}`, 'i');
const ELLIPTICAL = new RegExp(`^${MODAL}${OPERATOR_SOURCE}`);

/**
 * "股价高于20元但低于100元": a clause that opens with an operator borrows the
 * field that opens the previous clause. Anything else is returned unchanged.
 */
export function withSubject(clause: string, previous: string | undefined): string {
  if (previous === undefined || !ELLIPTICAL.test(clause)) return clause;
  const subject = SUBJECT.exec(previous);
  return subject ? group(subject, 1) + clause : clause;
}

/**
 * Match one clause against the catalogue. Returns the first usable comparison
 * with the id of the pattern that produced it, or the last rejection reason.
 */
export function matchClause(
  clause: string,
  patterns: readonly RulePattern[] = RULE_PATTERNS,
): ClauseMatch | { reason: string | null } {
  let reason: string | null = null;
  for (const p of patterns) {
    const m = p.regex.exec(clause);
    if (!m) continue;
    const out = p.build(m, clause);
    if (typeof out === 'string') {
      reason = out;
      continue;
    }
    const rest = [clause.slice(0, m.index), clause.slice(m.index + m[0].length)]
      .filter((part) => !DECORATION.test(part))
      .join('');
    return { node: out, patternId: p.id, confidence: p.confidence, rest };
  }
  return { reason };
}
