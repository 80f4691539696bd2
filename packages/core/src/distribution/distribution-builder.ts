/**
 * Builds the weighted distribution sampled on every stress iteration.
 *
 * Entries receive contiguous half-open ranges in configured order:
 * an entry with frequency f that follows a running total t owns [t, t + f).
 * Group references are expanded here so sampling never touches the config.
 */

import { Result, ok, err } from 'neverthrow';
import type { ParameterMap, QueryEntryConfig, QueryGroupConfig, StressConfig } from '../types/config.js';
import type {
  DistributionIndex,
  ParameterCandidates,
  ParameterPool,
  QueryMatcher,
  QuerySource,
  ResolvedQuery,
} from '../types/distribution.js';
import { DistributionError } from '../types/errors.js';
import { expandSequence } from './parameter-sequence.js';

function buildPool(
  entry: QueryEntryConfig,
  entryIndex: number,
): Result<ParameterPool, DistributionError> {
  const pool: Record<string, ParameterCandidates> = {};
  const parameters: ParameterMap = entry.parameters ?? {};

  for (const [name, values] of Object.entries(parameters)) {
    if (values.length === 0) {
      return err(new DistributionError(
        'empty-parameter',
        `Parameter "${name}" of query entry ${entryIndex} has no candidate values`,
        { entryIndex },
      ));
    }
    pool[name] = Object.freeze([...values]);
  }

  if (entry.sequence) {
    const range = expandSequence(entry.sequence, entryIndex);
    if (range.isErr()) {
      return err(range.error);
    }
    pool[entry.sequence.name] = Object.freeze(range.value);
  }

  return ok(Object.freeze(pool));
}

function resolveGroup(
  groupName: string,
  groups: readonly QueryGroupConfig[],
  pool: ParameterPool,
  entryIndex: number,
): Result<ResolvedQuery[], DistributionError> {
  const resolved: ResolvedQuery[] = [];
  let matched = false;

  // Several groups may share a name; their queries accumulate in order.
  for (const group of groups) {
    if (group.name !== groupName) continue;
    matched = true;
    if (group.queries.length === 0) {
      return err(new DistributionError(
        'empty-group',
        `Query group "${groupName}" referenced by query entry ${entryIndex} has zero queries`,
        { entryIndex, groupName },
      ));
    }
    for (const text of group.queries) {
      resolved.push({ text, pool });
    }
  }

  if (!matched) {
    return err(new DistributionError(
      'unknown-group',
      `Query group "${groupName}" referenced by query entry ${entryIndex} is not defined`,
      { entryIndex, groupName },
    ));
  }
  return ok(resolved);
}

interface ResolvedEntry {
  source: QuerySource;
  queries: ResolvedQuery[];
}

function resolveEntry(
  entry: QueryEntryConfig,
  groups: readonly QueryGroupConfig[],
  entryIndex: number,
): Result<ResolvedEntry, DistributionError> {
  const { query, queryGroup } = entry;

  if (typeof query === 'string' && typeof queryGroup === 'string') {
    return err(new DistributionError(
      'ambiguous-query-source',
      `Query entry ${entryIndex} sets both "query" and "queryGroup"; exactly one is allowed`,
      { entryIndex },
    ));
  }

  const pool = buildPool(entry, entryIndex);
  if (pool.isErr()) {
    return err(pool.error);
  }

  if (typeof query === 'string') {
    return ok({ source: { kind: 'query' } as const, queries: [{ text: query, pool: pool.value }] });
  }
  if (typeof queryGroup === 'string') {
    const queries = resolveGroup(queryGroup, groups, pool.value, entryIndex);
    if (queries.isErr()) {
      return err(queries.error);
    }
    return ok({ source: { kind: 'group', name: queryGroup } as const, queries: queries.value });
  }
  return err(new DistributionError(
    'missing-query-source',
    `Query entry ${entryIndex} has neither "query" nor "queryGroup" set; cannot build a query distribution`,
    { entryIndex },
  ));
}

export function buildDistribution(config: StressConfig): Result<DistributionIndex, DistributionError> {
  const groups = config.queryGroups ?? [];
  const matchers: QueryMatcher[] = [];
  let running = 0;

  for (const [entryIndex, entry] of config.queries.entries()) {
    if (!Number.isFinite(entry.frequency)) {
      return err(new DistributionError(
        'invalid-frequency',
        `Query entry ${entryIndex} has a non-finite frequency of ${entry.frequency}`,
        { entryIndex },
      ));
    }
    const frequency = Math.max(0, Math.trunc(entry.frequency));
    const range = Object.freeze({ min: running, max: running + frequency });
    running += frequency;

    const resolved = resolveEntry(entry, groups, entryIndex);
    if (resolved.isErr()) {
      return err(resolved.error);
    }

    matchers.push(Object.freeze({
      entryIndex,
      range,
      source: resolved.value.source,
      queries: Object.freeze(resolved.value.queries),
      sqlContext: Object.freeze([...(entry.sqlContext ?? [])]),
    }));
  }

  if (running <= 0) {
    return err(new DistributionError(
      'zero-total-frequency',
      'Total frequency is 0; at least one query entry needs a positive frequency',
    ));
  }
  if (!Number.isSafeInteger(running)) {
    return err(new DistributionError(
      'invalid-frequency',
      `Total frequency ${running} exceeds ${Number.MAX_SAFE_INTEGER}`,
    ));
  }

  return ok(Object.freeze({
    matchers: Object.freeze(matchers),
    totalFrequency: running,
  }));
}
