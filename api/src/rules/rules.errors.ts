import { FEATURE_NAMES } from '../indicators/feature-names';

/** Phrasing shown back to the user when nothing in a rule was understood. */
export const EXAMPLE_RULES: readonly string[] = [
  '股价大于10元且涨幅大于5%',
  '市值大于100亿且市盈率小于20',
  'RSI在30到70之间',
  '股价站上20日均线或连续3天上涨',
];

/**
 * No usable condition in the rule text (or, in strict mode, an unrecognized clause).
 */
export class RuleParseError extends Error {
  readonly examples = EXAMPLE_RULES;

  constructor(
    message: string,
    readonly unmatched: readonly string[] = [],
  ) {
    super(message);
    this.name = 'RuleParseError';
  }
}

/**
 * A rule names a feature outside the supported set. Raised before any data is fetched.
 */
export class UnknownFieldError extends Error {
  readonly known = FEATURE_NAMES;

  constructor(readonly field: string) {
    super(`Unknown field "${field}"`);
    this.name = 'UnknownFieldError';
  }
}

/** A saved predicate tree does not have the expected shape. */
export class InvalidPredicateError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`${path}: ${message}`);
    this.name = 'InvalidPredicateError';
  }
}
