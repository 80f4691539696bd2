export type {
  ParameterValue,
  ParameterMap,
  ParameterSequence,
  QueryEntryConfig,
  QueryGroupConfig,
  StressConfig,
  QueryOrder,
  ConfigFormat,
} from './config.js';
export type {
  WeightedRange,
  NumericRange,
  ParameterCandidates,
  ParameterPool,
  ResolvedQuery,
  QuerySource,
  QueryMatcher,
  DistributionIndex,
  RenderedBatch,
} from './distribution.js';
export type { DistributionErrorKind, DistributionErrorDetails } from './errors.js';
export { ConfigError, DistributionError, SamplingError } from './errors.js';
