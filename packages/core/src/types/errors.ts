import type { WeightedRange } from './distribution.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type DistributionErrorKind =
  | 'missing-query-source'
  | 'ambiguous-query-source'
  | 'empty-group'
  | 'unknown-group'
  | 'empty-parameter'
  | 'invalid-sequence'
  | 'invalid-frequency'
  | 'zero-total-frequency';

export interface DistributionErrorDetails {
  entryIndex?: number;
  groupName?: string;
}

/** Raised while building a distribution; the build is aborted as a whole. */
export class DistributionError extends Error {
  readonly kind: DistributionErrorKind;
  readonly entryIndex: number | undefined;
  readonly groupName: string | undefined;

  constructor(kind: DistributionErrorKind, message: string, details: DistributionErrorDetails = {}) {
    super(message);
    this.name = 'DistributionError';
    this.kind = kind;
    this.entryIndex = details.entryIndex;
    this.groupName = details.groupName;
  }
}

export class SamplingError extends Error {
  readonly pick: number;
  readonly ranges: readonly WeightedRange[];

  constructor(pick: number, ranges: readonly WeightedRange[]) {
    const listed = ranges.map((r) => `{start: ${r.min}, end: ${r.max}}`).join(', ');
    super(`No query range matched pick ${pick} out of: ${listed}`);
    this.name = 'SamplingError';
    this.pick = pick;
    this.ranges = ranges;
  }
}
