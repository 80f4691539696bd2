/**
 * Placeholder substitution for query templates.
 *
 * A token is `:` followed by one or more word characters. Each occurrence is
 * resolved on its own, so `:a + :a` may render two different values.
 * Tokens without a pool entry are left as written.
 */

import { randomIndex, type RandomSource } from '../random/seed-rng.js';
import type { ParameterValue } from '../types/config.js';
import type { NumericRange, ParameterCandidates, ParameterPool } from '../types/distribution.js';

const TOKEN_PATTERN = /:(\w+)/g;

export function isNumericRange(candidates: ParameterCandidates): candidates is NumericRange {
  return !Array.isArray(candidates);
}

export function candidateCount(candidates: ParameterCandidates): number {
  return isNumericRange(candidates) ? candidates.count : candidates.length;
}

export function candidateAt(candidates: ParameterCandidates, index: number): ParameterValue {
  if (isNumericRange(candidates)) {
    return candidates.start + index * candidates.step;
  }
  const value = candidates[index];
  if (value === undefined) {
    throw new RangeError(`Candidate index ${index} is out of bounds (${candidates.length} values)`);
  }
  return value;
}

/** Default text form of a parameter value; `null` becomes SQL `NULL`. */
export function formatParameterValue(value: ParameterValue): string {
  return value === null ? 'NULL' : String(value);
}

/** Token names in order of appearance, repeats included. */
export function findTokens(template: string): string[] {
  return Array.from(template.matchAll(TOKEN_PATTERN), (match) => match[1] ?? '');
}

export function renderTemplate(
  template: string,
  pool: ParameterPool,
  random: RandomSource,
): string {
  return template.replace(TOKEN_PATTERN, (match: string, name: string) => {
    if (!Object.hasOwn(pool, name)) {
      return match;
    }
    const candidates = pool[name];
    if (candidates === undefined || candidateCount(candidates) === 0) {
      return match;
    }
    const pick = randomIndex(random, candidateCount(candidates));
    return formatParameterValue(candidateAt(candidates, pick));
  });
}
