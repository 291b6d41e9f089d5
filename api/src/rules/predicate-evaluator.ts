// api/src/rules/predicate-evaluator.ts

import { FeatureLookup, FeatureName, isFeatureName } from '../indicators/feature-names';
import {
  Comparison,
  FeatureRef,
  LogicalOp,
  PredicateNode,
  SCALAR_OPERATORS,
  between,
  compare,
  isFeatureRef,
  logical,
} from './predicate.models';
import { InvalidPredicateError, UnknownFieldError } from './rules.errors';

const EQ_TOLERANCE = 1e-9;

const read = (features: FeatureLookup, name: FeatureName): number | null => {
  const v = features[name];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
};

const nearlyEqual = (a: number, b: number) =>
  Math.abs(a - b) <= EQ_TOLERANCE * Math.max(1, Math.abs(a), Math.abs(b));

/**
 * Evaluate a predicate tree against one stock's features.
 * Unavailable data never passes and never throws.
 */
export function evaluatePredicate(node: PredicateNode, features: FeatureLookup): boolean {
  if (node.kind === 'logical') {
    // every() is vacuously true and some() false on an empty list
    return node.op === 'AND'
      ? node.children.every((c) => evaluatePredicate(c, features))
      : node.children.some((c) => evaluatePredicate(c, features));
  }
  return evaluateComparison(node, features);
}

function evaluateComparison(node: Comparison, features: FeatureLookup): boolean {
  const x = read(features, node.field);
  if (x == null) return false;

  if (node.operator === 'between') {
    const { low, high } = node.value;
    return low <= high && x >= low && x <= high;
  }

  const rhs = isFeatureRef(node.value) ? read(features, node.value.feature) : node.value;
  if (rhs == null || !Number.isFinite(rhs)) return false;

  switch (node.operator) {
    case '>':
      return x > rhs;
    case '<':
      return x < rhs;
    case '>=':
      return x >= rhs;
    case '<=':
      return x <= rhs;
    case '==':
      return nearlyEqual(x, rhs);
  }
}

/* ------------------------------ inspection ----------------------------- */

/** Every feature the tree reads, including right-hand feature references. */
export function collectFields(node: PredicateNode, into = new Set<FeatureName>()): Set<FeatureName> {
  if (node.kind === 'logical') {
    for (const c of node.children) collectFields(c, into);
    return into;
  }
  into.add(node.field);
  if (node.operator !== 'between' && isFeatureRef(node.value)) into.add(node.value.feature);
  return into;
}

/**
 * Fail fast on a name outside the feature catalogue.
 */
export function assertKnownFields(node: PredicateNode): void {
  for (const f of collectFields(node)) {
    if (!isFeatureName(f)) throw new UnknownFieldError(f);
  }
}

export function countLeaves(node: PredicateNode): number {
  return node.kind === 'logical'
    ? node.children.reduce((n, c) => n + countLeaves(c), 0)
    : 1;
}

export function describePredicate(node: PredicateNode): string {
  if (node.kind === 'logical') {
    if (!node.children.length) return node.op === 'AND' ? 'TRUE' : 'FALSE';
    return `(${node.children.map(describePredicate).join(` ${node.op} `)})`;
  }
  if (node.operator === 'between') {
    return `${node.field} between ${node.value.low} and ${node.value.high}`;
  }
  const rhs = isFeatureRef(node.value) ? node.value.feature : String(node.value);
  return `${node.field} ${node.operator} ${rhs}`;
}

/* ------------------------------ conversion ----------------------------- */

type JsonObject = Record<string, unknown>;

const isObject = (x: unknown): x is JsonObject =>
  typeof x === 'object' && x !== null && !Array.isArray(x);

const isNumber = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x);

function fieldOf(raw: unknown, path: string): FeatureName {
  if (typeof raw !== 'string' || !raw) {
    throw new InvalidPredicateError('field must be a non-empty string', path);
  }
  if (!isFeatureName(raw)) throw new UnknownFieldError(raw);
  return raw;
}

function logicalOpOf(raw: unknown, path: string): LogicalOp {
  const op = typeof raw === 'string' ? raw.toUpperCase() : raw;
  if (op === 'AND' || op === 'OR') return op;
  throw new InvalidPredicateError('op must be AND or OR', path);
}

function rangeOf(raw: unknown, path: string): { low: number; high: number } {
  if (Array.isArray(raw) && raw.length === 2 && isNumber(raw[0]) && isNumber(raw[1])) {
    return { low: raw[0], high: raw[1] };
  }
  if (isObject(raw) && isNumber(raw.low) && isNumber(raw.high)) {
    return { low: raw.low, high: raw.high };
  }
  throw new InvalidPredicateError('between needs numeric {low, high}', path);
}

function scalarOf(raw: unknown, path: string): number | FeatureRef {
  if (isNumber(raw)) return raw;
  if (isObject(raw) && 'feature' in raw) {
    return { feature: fieldOf(raw.feature, `${path}.feature`) };
  }
  throw new InvalidPredicateError('value must be a number or {feature}', path);
}

/**
 * Rebuild a frozen predicate tree from untrusted JSON, e.g. a saved screen posted back.
 */
export function toPredicateNode(raw: unknown, path = 'predicate'): PredicateNode {
  if (!isObject(raw)) throw new InvalidPredicateError('node must be an object', path);

  if (raw.kind === 'logical' || 'children' in raw) {
    if (!Array.isArray(raw.children)) {
      throw new InvalidPredicateError('children must be an array', `${path}.children`);
    }
    const op = logicalOpOf(raw.op, `${path}.op`);
    return logical(
      op,
      raw.children.map((c: unknown, i) => toPredicateNode(c, `${path}.children[${i}]`)),
    );
  }

  if (raw.kind !== undefined && raw.kind !== 'comparison') {
    throw new InvalidPredicateError(`unknown node kind ${String(raw.kind)}`, `${path}.kind`);
  }

  const field = fieldOf(raw.field, `${path}.field`);
  const description = typeof raw.description === 'string' ? raw.description : undefined;

  if (raw.operator === 'between') {
    const { low, high } = rangeOf(raw.value, `${path}.value`);
    return between(field, low, high, description);
  }

  const operator = SCALAR_OPERATORS.find((o) => o === raw.operator);
  if (!operator) {
    throw new InvalidPredicateError(
      `operator must be one of ${[...SCALAR_OPERATORS, 'between'].join(', ')}`,
      `${path}.operator`,
    );
  }
  return compare(field, operator, scalarOf(raw.value, `${path}.value`), description);
}
