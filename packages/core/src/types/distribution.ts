import type { ParameterValue } from './config.js';

/** Half-open interval `[min, max)` owned by one query entry. */
export interface WeightedRange {
  readonly min: number;
  readonly max: number;
}

/** A contiguous run of integers `start, start + step, …` with `count` members. */
export interface NumericRange {
  readonly start: number;
  readonly step: number;
  readonly count: number;
}

export type ParameterCandidates = readonly ParameterValue[] | NumericRange;

export type ParameterPool = Readonly<Record<string, ParameterCandidates>>;

export interface ResolvedQuery {
  readonly text: string;
  readonly pool: ParameterPool;
}

export type QuerySource =
  | { readonly kind: 'query' }
  | { readonly kind: 'group'; readonly name: string };

export interface QueryMatcher {
  readonly entryIndex: number;
  readonly range: WeightedRange;
  readonly source: QuerySource;
  readonly queries: readonly ResolvedQuery[];
  readonly sqlContext: readonly string[];
}

export interface DistributionIndex {
  readonly matchers: readonly QueryMatcher[];
  readonly totalFrequency: number;
}

/** The unit of work handed to an executor for one iteration. */
export interface RenderedBatch {
  readonly entryIndex: number;
  readonly source: QuerySource;
  readonly queries: string[];
  readonly sqlContext: readonly string[];
}
