/** A literal a placeholder can be replaced with. */
export type ParameterValue = string | number | boolean | null;

/** Candidate values per placeholder name, scoped to one query entry. */
export type ParameterMap = Record<string, ParameterValue[]>;

/**
 * Generates a numeric parameter pool instead of listing every value.
 * `end` is inclusive; `step` defaults to 1 and may be negative.
 */
export interface ParameterSequence {
  name: string;
  start: number;
  end: number;
  step?: number;
}

export interface QueryEntryConfig {
  /** Relative weight; entries with 0 are legal but never sampled. */
  frequency: number;
  query?: string | null;
  queryGroup?: string | null;
  parameters?: ParameterMap | null;
  sequence?: ParameterSequence | null;
  /** Default schema path handed to the executor alongside the rendered queries. */
  sqlContext?: string[] | null;
}

export interface QueryGroupConfig {
  name: string;
  queries: string[];
}

export interface StressConfig {
  queries: QueryEntryConfig[];
  queryGroups?: QueryGroupConfig[];
}

export type QueryOrder = 'random' | 'sequential';

export type ConfigFormat = 'json' | 'yaml';
