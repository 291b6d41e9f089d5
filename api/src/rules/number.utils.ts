// api/src/rules/number.utils.ts

/** Longest first so 万亿 wins over 万 and 亿. */
export const MAGNITUDES: ReadonlyArray<readonly [string, number]> = [
  ['万亿', 1e12],
  ['千亿', 1e11],
  ['百亿', 1e10],
  ['十亿', 1e9],
  ['亿', 1e8],
  ['千万', 1e7],
  ['百万', 1e6],
  ['十万', 1e5],
  ['万', 1e4],
];

const MAGNITUDE_SOURCE = MAGNITUDES.map(([m]) => m).join('|');

/** Units that only decorate a number; 手 is a board lot of 100 shares. */
const UNIT_FACTORS: Readonly<Record<string, number>> = {
  元: 1,
  块: 1,
  块钱: 1,
  倍: 1,
  股: 1,
  手: 100,
};

const UNIT_SOURCE = Object.keys(UNIT_FACTORS)
  .sort((a, b) => b.length - a.length)
  .join('|');

/**
 * A number with optional magnitude, percent marker and unit, e.g. "200亿元", "5%", "3个百分点".
 * Groups: 1 digits, 2 magnitude, 3 percent, 4 unit.
 */
export const NUMBER_SOURCE = `(-?\\d+(?:\\.\\d+)?)(${MAGNITUDE_SOURCE})?(%|个百分点|百分点)?(${UNIT_SOURCE})?`;

export interface NumericLiteral {
  /** digits times magnitude and unit factor */
  value: number;
  percent: boolean;
  magnitude: string | null;
  unit: string | null;
}

/**
 * Read the four NUMBER_SOURCE groups starting at `offset` in a match.
 */
export function literalFromGroups(
  groups: ReadonlyArray<string | undefined>,
  offset: number,
): NumericLiteral | null {
  const digits = groups[offset];
  if (digits == null) return null;
  const n = Number(digits);
  if (!Number.isFinite(n)) return null;

  const magnitude = groups[offset + 1] ?? null;
  const unit = groups[offset + 3] ?? null;
  const scale =
    (magnitude ? MAGNITUDES.find(([m]) => m === magnitude)?.[1] ?? 1 : 1) *
    (unit ? UNIT_FACTORS[unit] ?? 1 : 1);

  return {
    value: n * scale,
    percent: groups[offset + 2] != null,
    magnitude,
    unit,
  };
}

const NUMBER_ONLY = new RegExp(`^${NUMBER_SOURCE}$`);

/** Parse a standalone literal such as "1.5万亿"; null when the text is not one. */
export function parseNumberLiteral(text: string): NumericLiteral | null {
  const m = NUMBER_ONLY.exec(text.trim());
  return m ? literalFromGroups(m, 1) : null;
}

const CN_DIGITS: Readonly<Record<string, number>> = {
  零: 0,
  一: 1,
  二: 2,
  两: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9,
};

const CN_UNITS: Readonly<Record<string, number>> = { 十: 10, 百: 100, 千: 1000 };

export const CN_INTEGER_SOURCE = '[零一二两三四五六七八九十百千]+';

/**
 * Small Chinese integers: 三 = 3, 十五 = 15, 二十 = 20, 一百二十 = 120.
 * Arabic digits pass through. Returns null for anything else.
 */
export function parseInteger(text: string): number | null {
  if (/^\d+$/.test(text)) return Number(text);
  if (!new RegExp(`^${CN_INTEGER_SOURCE}$`).test(text)) return null;

  let total = 0;
  let digit: number | null = null;
  for (const ch of text) {
    if (ch in CN_DIGITS) {
      if (digit != null && digit !== 0) return null; // two digits in a row
      digit = CN_DIGITS[ch];
    } else {
      const unit = CN_UNITS[ch];
      // a leading 十 means 一十
      total += (digit ?? 1) * unit;
      digit = null;
    }
  }
  return total + (digit ?? 0);
}

const FULL_WIDTH: Readonly<Record<string, string>> = {
  '％': '%',
  '＞': '>',
  '＜': '<',
  '＝': '=',
  '．': '.',
  '，': ',',
  '；': ';',
  '：': ':',
  '（': '(',
  '）': ')',
  '～': '~',
  '－': '-',
  '。': ';',
  '≥': '>=',
  '≤': '<=',
};

/**
 * Half-width digits and operators, no whitespace.
 */
export function normalizeWidth(text: string): string {
  let out = '';
  for (const ch of text) {
    const code = ch.charCodeAt(0);
    if (code >= 0xff10 && code <= 0xff19) out += String.fromCharCode(code - 0xfee0);
    else if (code >= 0xff21 && code <= 0xff5a) out += String.fromCharCode(code - 0xfee0);
    else out += FULL_WIDTH[ch] ?? ch;
  }
  return out.replace(/\s+/g, '');
}
