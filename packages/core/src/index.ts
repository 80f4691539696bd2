// @querymix/core: weighted query distribution, sampling and parameter rendering
export const QUERYMIX_VERSION = '0.1.0';

export type {
  ParameterValue,
  ParameterMap,
  ParameterSequence,
  QueryEntryConfig,
  QueryGroupConfig,
  StressConfig,
  QueryOrder,
  ConfigFormat,
  WeightedRange,
  NumericRange,
  ParameterCandidates,
  ParameterPool,
  ResolvedQuery,
  QuerySource,
  QueryMatcher,
  DistributionIndex,
  RenderedBatch,
  DistributionErrorKind,
  DistributionErrorDetails,
} from './types/index.js';

export { ConfigError, DistributionError, SamplingError } from './types/index.js';

// Config
export {
  loadStressConfig,
  parseStressConfig,
  detectConfigFormat,
  formatZodErrors,
  stressConfigSchema,
} from './config/config-parser.js';
export type { StressConfigSchema } from './config/config-parser.js';
export { parseQueryLog, buildConfigFromQueryLog } from './config/query-log-importer.js';
export type { QueryLogRow, QueryLogImportOptions } from './config/query-log-importer.js';

// Distribution
export { buildDistribution } from './distribution/distribution-builder.js';
export { expandSequence } from './distribution/parameter-sequence.js';

// Sampling
export {
  QuerySampler,
  SequentialQuerySampler,
  createQueryGenerator,
  findMatcher,
  renderMatcher,
} from './sampler/query-sampler.js';
export type { QueryGenerator, QueryGeneratorOptions } from './sampler/query-sampler.js';

// Templates
export {
  renderTemplate,
  findTokens,
  formatParameterValue,
  candidateAt,
  candidateCount,
  isNumericRange,
} from './template/token-renderer.js';

// Randomness
export { SeededRng, mathRandomSource, randomIndex } from './random/seed-rng.js';
export type { RandomSource } from './random/seed-rng.js';

// Formatting
export { formatDuration } from './utils/human.js';
