/**
 * Exhaustive n-mer matching
 *
 * Compares every query window with every text window. Quadratic in the
 * input lengths; serves as the reference the filtered matcher must agree
 * with.
 *
 * @module brute-force
 */

import type { MatchPair } from "../../types";
import { countMismatches } from "./hamming";

/**
 * All 1-based (queryStart, textStart) pairs whose n-mers differ in at most
 * k positions, in ascending order
 */
export function bruteForceQueryMatch(
  query: string,
  text: string,
  n: number,
  k: number
): MatchPair[] {
  if (n <= 0 || k < 0) return [];
  if (n > query.length || n > text.length) return [];

  const matches: MatchPair[] = [];

  for (let i = 0; i <= query.length - n; i++) {
    for (let j = 0; j <= text.length - n; j++) {
      if (countMismatches(query, i, text, j, n, k) <= k) {
        matches.push({ queryStart: i + 1, textStart: j + 1 });
      }
    }
  }

  return matches;
}
