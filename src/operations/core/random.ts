/**
 * Seedable random number generation
 *
 * Sequence generation takes its randomness as an argument so that every
 * generated dataset can be reproduced from a seed.
 *
 * @module random
 */

import type { RandomSource } from "../../types";

/**
 * Create a seeded random source using xorshift32
 *
 * A seed of 0 would keep xorshift at 0 forever, so it is remapped to a
 * fixed non-zero state.
 *
 * @example
 * ```typescript
 * const rng = createSeededRandom(42);
 * rng(); // same value on every run
 * ```
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0 || 0x9e3779b9;

  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    // Convert to [0, 1) range
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Uniform integer in [0, maxExclusive)
 */
export function randomInt(rng: RandomSource, maxExclusive: number): number {
  return Math.floor(rng() * maxExclusive);
}

/**
 * Pick one element of a non-empty string or array
 */
export function randomChoice<T>(rng: RandomSource, items: ArrayLike<T>): T {
  const item = items[randomInt(rng, items.length)];
  if (item === undefined) {
    throw new RangeError("Cannot choose from an empty collection");
  }
  return item;
}
