/**
 * Random sources for the sampler.
 *
 * Sampling only ever needs a float in [0, 1), so the sampler depends on the
 * `RandomSource` interface instead of `Math.random` directly. `SeededRng`
 * gives reproducible runs; `mathRandomSource` is the default.
 */

/** LCG multiplier (Park-Miller) */
const LCG_MULTIPLIER = 48271;
/** LCG modulus (Mersenne prime 2^31 - 1) */
const LCG_MODULUS = 2147483647;

export interface RandomSource {
  /** Returns a float in [0, 1). */
  next(): number;
}

export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/** Uniform integer in [0, bound). `bound` must be a positive integer. */
export function randomIndex(random: RandomSource, bound: number): number {
  const index = Math.floor(random.next() * bound);
  // Guards against sources that return exactly 1.
  return Math.min(index, bound - 1);
}

/** Park-Miller generator; equal seeds yield equal draws. */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // Any integer seed, negative included, folds into 1..LCG_MODULUS - 1.
    const period = LCG_MODULUS - 1;
    this.state = (((seed % period) + period) % period) + 1;
  }

  next(): number {
    this.state = (this.state * LCG_MULTIPLIER) % LCG_MODULUS;
    // state is never 0, so shift down to land in [0, 1).
    return (this.state - 1) / (LCG_MODULUS - 1);
  }
}
