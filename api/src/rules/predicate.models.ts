// api/src/rules/predicate.models.ts

import { FeatureName } from '../indicators/feature-names';

export type ScalarOperator = '>' | '<' | '>=' | '<=' | '==';
export type ComparisonOperator = ScalarOperator | 'between';
export type LogicalOp = 'AND' | 'OR';

export const SCALAR_OPERATORS: readonly ScalarOperator[] = ['>', '<', '>=', '<=', '=='];

/** Right-hand side naming another feature of the same stock, e.g. price > ma20. */
export interface FeatureRef {
  readonly feature: FeatureName;
}

export interface ScalarComparison {
  readonly kind: 'comparison';
  readonly field: FeatureName;
  readonly operator: ScalarOperator;
  readonly value: number | FeatureRef;
  readonly description?: string;
}

/** Inclusive on both bounds. */
export interface RangeComparison {
  readonly kind: 'comparison';
  readonly field: FeatureName;
  readonly operator: 'between';
  readonly value: { readonly low: number; readonly high: number };
  readonly description?: string;
}

export type Comparison = ScalarComparison | RangeComparison;

export interface Logical {
  readonly kind: 'logical';
  readonly op: LogicalOp;
  readonly children: readonly PredicateNode[];
}

/**
 * Built once per rule and shared read-only by every symbol of a run.
 */
export type PredicateNode = Comparison | Logical;

/* ---------------------------- constructors ---------------------------- */

export function compare(
  field: FeatureName,
  operator: ScalarOperator,
  value: number | FeatureRef,
  description?: string,
): ScalarComparison {
  const node: ScalarComparison = {
    kind: 'comparison',
    field,
    operator,
    value: typeof value === 'number' ? value : Object.freeze({ feature: value.feature }),
    description,
  };
  return Object.freeze(node);
}

export function between(
  field: FeatureName,
  low: number,
  high: number,
  description?: string,
): RangeComparison {
  const node: RangeComparison = {
    kind: 'comparison',
    field,
    operator: 'between',
    value: Object.freeze({ low, high }),
    description,
  };
  return Object.freeze(node);
}

export function logical(op: LogicalOp, children: readonly PredicateNode[]): Logical {
  const node: Logical = { kind: 'logical', op, children: Object.freeze([...children]) };
  return Object.freeze(node);
}

export const and = (...children: PredicateNode[]) => logical('AND', children);
export const or = (...children: PredicateNode[]) => logical('OR', children);

export const isFeatureRef = (v: ScalarComparison['value']): v is FeatureRef =>
  typeof v !== 'number';
