/**
 * Hamming distance for equal-length sequences
 *
 * Verification step of seed-and-extend matching. The bounded variants stop
 * counting once the budget is exceeded, which never changes whether a
 * candidate is accepted.
 *
 * @module hamming
 */

import { ValidationError } from "../../errors";

/**
 * Count positions where two equal-length strings differ
 *
 * @throws {ValidationError} When the lengths differ
 *
 * @example
 * ```typescript
 * hammingDistance("ACGT", "ACCT"); // 1
 * ```
 */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) {
    throw new ValidationError(
      `Hamming distance needs equal lengths, got ${a.length} and ${b.length}`
    );
  }
  return countMismatches(a, 0, b, 0, a.length);
}

/**
 * Hamming distance that gives up once it exceeds `max`
 *
 * @returns The exact distance when it is <= max, otherwise max + 1
 */
export function boundedHammingDistance(a: string, b: string, max: number): number {
  if (a.length !== b.length) {
    throw new ValidationError(
      `Hamming distance needs equal lengths, got ${a.length} and ${b.length}`
    );
  }
  return countMismatches(a, 0, b, 0, a.length, max);
}

/**
 * Compare `length` characters of `a` from `aStart` with `b` from `bStart`
 * without slicing either string.
 *
 * Callers guarantee both ranges are in bounds. With `max` set, returns
 * max + 1 as soon as the count passes it.
 */
export function countMismatches(
  a: string,
  aStart: number,
  b: string,
  bStart: number,
  length: number,
  max: number = Number.POSITIVE_INFINITY
): number {
  let mismatches = 0;

  for (let offset = 0; offset < length; offset++) {
    if (a.charCodeAt(aStart + offset) !== b.charCodeAt(bStart + offset)) {
      mismatches++;
      if (mismatches > max) return max + 1;
    }
  }

  return mismatches;
}
