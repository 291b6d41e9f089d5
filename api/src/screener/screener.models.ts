// api/src/screener/screener.models.ts

import { FeatureName } from '../indicators/feature-names';
import { PredicateNode } from '../rules/predicate.models';

export interface ScreenOptions {
  predicate: PredicateNode;
  /** explicit universe; defaults to the data source's symbol list */
  symbols?: string[];
  /** rank matches by this feature, descending */
  sortBy?: string;
  limit?: number;
  startDate?: string;
  endDate?: string;
  /** keep symbols that were evaluated but did not pass */
  includeFailed?: boolean;
  signal?: AbortSignal;
}

export type OmissionCode = 'DATA_UNAVAILABLE' | 'CANCELLED';

export interface ScreenMatch {
  symbol: string;
  name?: string;
  passed: boolean;
  features: Readonly<Record<FeatureName, number | null>>;
  degraded: FeatureName[];
  asOf: string | null;
  source: string;
  simulated: boolean;
}

export interface Omission {
  symbol: string;
  reason: string;
  code: OmissionCode;
}

/**
 * Outcome of one screening run. Built once, never mutated; a cancelled run
 * still returns everything collected before the abort.
 */
export interface ScreeningResult {
  predicate: PredicateNode;
  description: string;
  matches: ScreenMatch[];
  omitted: Omission[];
  universeSize: number;
  /** symbols whose pipeline actually ran */
  scanned: number;
  cancelled: boolean;
  /** true when any returned row came from synthetic data */
  simulated: boolean;
  sortBy?: FeatureName;
  startDate: string;
  endDate: string;
  startedAt: string;
  finishedAt: string;
  warnings: string[];
  /** parse confidence, when the predicate came from rule text */
  confidence?: number;
}
