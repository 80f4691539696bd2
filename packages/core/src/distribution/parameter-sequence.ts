import { Result, ok, err } from 'neverthrow';
import type { ParameterSequence } from '../types/config.js';
import type { NumericRange } from '../types/distribution.js';
import { DistributionError } from '../types/errors.js';

/**
 * Turn a `sequence` block into a lazily indexed range. `end` is inclusive and
 * the range is never materialized, so wide sequences cost nothing up front.
 */
export function expandSequence(
  sequence: ParameterSequence,
  entryIndex: number,
): Result<NumericRange, DistributionError> {
  const step = sequence.step ?? 1;
  const invalid = (reason: string): DistributionError =>
    new DistributionError(
      'invalid-sequence',
      `Sequence "${sequence.name}" of query entry ${entryIndex} ${reason}`,
      { entryIndex },
    );

  if (step === 0) {
    return err(invalid('has a step of 0'));
  }
  if (!Number.isSafeInteger(sequence.start) || !Number.isSafeInteger(sequence.end) || !Number.isSafeInteger(step)) {
    return err(invalid(`needs integer bounds and step, got ${sequence.start}..${sequence.end} by ${step}`));
  }

  const span = (sequence.end - sequence.start) / step;
  if (span < 0) {
    return err(invalid(`cannot reach ${sequence.end} from ${sequence.start} with a step of ${step}`));
  }

  return ok({
    start: sequence.start,
    step,
    count: Math.floor(span) + 1,
  });
}
