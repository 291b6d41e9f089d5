// api/src/rules/rule-parser.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { normalizeWidth } from './number.utils';
import { describePredicate } from './predicate-evaluator';
import { Comparison, Logical, PredicateNode, and, logical, or } from './predicate.models';
import { RULE_PATTERNS, matchClause, withSubject } from './rule-patterns';
import { RuleParseError } from './rules.errors';

export interface ParseOptions {
  /** fail on the first clause no pattern recognizes */
  strict?: boolean;
}

export interface ParsedClause {
  text: string;
  patternId: string;
  node: Comparison;
  /** 0..1; lower for vague wording or a clause with ignored text */
  confidence: number;
}

export interface ParsedRule {
  text: string;
  normalized: string;
  predicate: Logical;
  clauses: ParsedClause[];
  warnings: string[];
  description: string;
  /** mean clause confidence */
  confidence: number;
}

/** Phrases rewritten before splitting, so the connective inside them survives. */
const REWRITES: ReadonlyArray<readonly [RegExp, string]> = [
  [/大于或等于|大于等于/g, '>='],
  [/小于或等于|小于等于/g, '<='],
  [/不要太高/g, '小于50'],
  [/不要太低/g, '大于5'],
  [/避免高价/g, '小于30'],
  [/排除低价/g, '大于10'],
];

const OR_SPLIT = /或者|或|要么|\|\||\|/;
const AND_SPLIT = /并且|而且|且|但是|但|同时|以及|&&|&|,|;|、/;

/** 1,000万: digit grouping, not a clause separator */
const DIGIT_GROUPING = /(\d),(?=\d{3}(?!\d))/g;

const PARTIAL_MATCH_CONFIDENCE = 0.5;

const LEADING_FILLER =
  /^(?:请)?(?:帮我|给我)?(?:寻找|查找|找出|找|筛选出|筛选|选出|选择|选|要求|希望|最好是|最好)?(?:一些|一下)?/;
const TRAILING_FILLER = /(?:的股票|股票|的个股|个股|的)$/;

/**
 * Turns a natural-language rule into a predicate tree.
 *
 * The text is split on OR connectives, each OR group on AND connectives, and every clause is
 * matched on its own against the ordered pattern catalogue. AND binds tighter than OR and
 * there is no grouping syntax.
 */
@Injectable()
export class RuleParserService {
  private readonly logger = new Logger(RuleParserService.name);
  private readonly defaultStrict: boolean;

  constructor(config: ConfigService) {
    this.defaultStrict = config.get<boolean>('rules.strict') ?? false;
  }

  parse(text: string, options: ParseOptions = {}): ParsedRule {
    const strict = options.strict ?? this.defaultStrict;
    const normalized = this.normalize(text);
    if (!normalized) {
      throw new RuleParseError('Rule text is empty');
    }

    const clauses: ParsedClause[] = [];
    const unmatched: string[] = [];
    const warnings: string[] = [];
    const groups: Comparison[][] = [];

    for (const orPart of normalized.split(OR_SPLIT)) {
      const group: Comparison[] = [];
      let previous: string | undefined;
      for (const raw of orPart.split(AND_SPLIT)) {
        const stripped = stripFiller(raw);
        if (!stripped) continue;
        const clause = withSubject(stripped, previous);

        const hit = matchClause(clause, RULE_PATTERNS);
        if ('node' in hit) {
          let confidence = hit.confidence;
          if (hit.rest) {
            if (strict) {
              throw new RuleParseError(
                `Unrecognized text "${hit.rest}" in condition "${clause}"`,
                [hit.rest],
              );
            }
            warnings.push(`Ignored unrecognized text "${hit.rest}" in condition "${clause}"`);
            confidence = Math.min(confidence, PARTIAL_MATCH_CONFIDENCE);
          }
          group.push(hit.node);
          clauses.push({ text: clause, patternId: hit.patternId, node: hit.node, confidence });
          previous = clause;
          continue;
        }

        const detail = hit.reason ? ` (${hit.reason})` : '';
        if (strict) {
          throw new RuleParseError(`Unrecognized condition "${clause}"${detail}`, [clause]);
        }
        unmatched.push(clause);
        warnings.push(`Ignored unrecognized condition "${clause}"${detail}`);
      }
      if (group.length) groups.push(group);
    }

    if (!groups.length) {
      throw new RuleParseError('No recognizable condition found', unmatched);
    }

    const predicate = toTree(groups);
    this.logger.debug(
      `Parsed "${text}" into ${clauses.length} condition(s), ${warnings.length} ignored`,
    );

    return {
      text,
      normalized,
      predicate,
      clauses,
      warnings,
      description: describePredicate(predicate),
      confidence: clauses.reduce((sum, c) => sum + c.confidence, 0) / clauses.length,
    };
  }

  private normalize(text: string): string {
    let out = normalizeWidth(text).replace(DIGIT_GROUPING, '$1');
    for (const [from, to] of REWRITES) out = out.replace(from, to);
    return out;
  }
}

function stripFiller(clause: string): string {
  return clause.replace(LEADING_FILLER, '').replace(TRAILING_FILLER, '');
}

function toTree(groups: Comparison[][]): Logical {
  if (groups.length === 1) return and(...groups[0]);
  return or(
    ...groups.map((g): PredicateNode => (g.length === 1 ? g[0] : logical('AND', g))),
  );
}
