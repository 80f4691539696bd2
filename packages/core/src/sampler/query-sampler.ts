import { Result, ok, err } from 'neverthrow';
import { mathRandomSource, randomIndex, type RandomSource } from '../random/seed-rng.js';
import { renderTemplate } from '../template/token-renderer.js';
import type { DistributionIndex, QueryMatcher, RenderedBatch } from '../types/distribution.js';
import { SamplingError } from '../types/errors.js';
import type { QueryOrder } from '../types/config.js';

/** Produces the queries for one stress iteration. */
export interface QueryGenerator {
  sample(): Result<string[], SamplingError>;
  sampleBatch(): Result<RenderedBatch, SamplingError>;
}

/**
 * Linear scan for the matcher whose range holds `pick`.
 * Entry counts are configuration-sized, so O(n) per lookup is fine.
 */
export function findMatcher(index: DistributionIndex, pick: number): QueryMatcher | undefined {
  return index.matchers.find((m) => pick >= m.range.min && pick < m.range.max);
}

export function renderMatcher(matcher: QueryMatcher, random: RandomSource): RenderedBatch {
  return {
    entryIndex: matcher.entryIndex,
    source: matcher.source,
    queries: matcher.queries.map((q) => renderTemplate(q.text, q.pool, random)),
    sqlContext: matcher.sqlContext,
  };
}

function renderPick(
  index: DistributionIndex,
  pick: number,
  random: RandomSource,
): Result<RenderedBatch, SamplingError> {
  const matcher = findMatcher(index, pick);
  if (!matcher) {
    return err(new SamplingError(pick, index.matchers.map((m) => m.range)));
  }
  return ok(renderMatcher(matcher, random));
}

/**
 * Frequency-weighted sampler. Holds no state besides the random source,
 * so one instance can serve any number of callers.
 */
export class QuerySampler implements QueryGenerator {
  private readonly index: DistributionIndex;
  private readonly random: RandomSource;

  constructor(index: DistributionIndex, random: RandomSource = mathRandomSource) {
    this.index = index;
    this.random = random;
  }

  sample(): Result<string[], SamplingError> {
    const batch = this.sampleBatch();
    return batch.isErr() ? err(batch.error) : ok(batch.value.queries);
  }

  sampleBatch(): Result<RenderedBatch, SamplingError> {
    return this.sampleAt(randomIndex(this.random, this.index.totalFrequency));
  }

  /** Render the entry owning `pick` without drawing a new one. */
  sampleAt(pick: number): Result<RenderedBatch, SamplingError> {
    return renderPick(this.index, pick, this.random);
  }
}

/**
 * Walks picks 0, 1, 2, … modulo the total frequency, so entries come out in
 * configured order, each repeated `frequency` times. Parameters are still drawn
 * at random. The cursor is per instance.
 */
export class SequentialQuerySampler implements QueryGenerator {
  private readonly index: DistributionIndex;
  private readonly random: RandomSource;
  private cursor = 0;

  constructor(index: DistributionIndex, random: RandomSource = mathRandomSource) {
    this.index = index;
    this.random = random;
  }

  sample(): Result<string[], SamplingError> {
    const batch = this.sampleBatch();
    return batch.isErr() ? err(batch.error) : ok(batch.value.queries);
  }

  sampleBatch(): Result<RenderedBatch, SamplingError> {
    const pick = this.cursor;
    this.cursor = (this.cursor + 1) % this.index.totalFrequency;
    return renderPick(this.index, pick, this.random);
  }
}

export interface QueryGeneratorOptions {
  order?: QueryOrder;
  random?: RandomSource;
}

export function createQueryGenerator(
  index: DistributionIndex,
  options: QueryGeneratorOptions = {},
): QueryGenerator {
  const random = options.random ?? mathRandomSource;
  return options.order === 'sequential'
    ? new SequentialQuerySampler(index, random)
    : new QuerySampler(index, random);
}
