/**
 * Duplicate-free collection of match pairs
 *
 * @module match-set
 */

import type { MatchPair } from "../../types";

/**
 * Order pairs by query offset, then text offset
 */
export function compareMatchPairs(a: MatchPair, b: MatchPair): number {
  return a.queryStart - b.queryStart || a.textStart - b.textStart;
}

/**
 * Set of MatchPairs keyed by value rather than identity.
 *
 * The same alignment can be reached through several seeds; adding it again
 * is a no-op. `toSortedArray` gives the ascending (queryStart, textStart)
 * order every matcher returns.
 */
export class MatchSet {
  private readonly pairs = new Map<string, MatchPair>();

  /**
   * Add a pair; returns false if an equal pair was already present
   */
  add(pair: MatchPair): boolean {
    const key = MatchSet.keyOf(pair);
    if (this.pairs.has(key)) return false;
    this.pairs.set(key, { queryStart: pair.queryStart, textStart: pair.textStart });
    return true;
  }

  addAll(pairs: Iterable<MatchPair>): void {
    for (const pair of pairs) {
      this.add(pair);
    }
  }

  has(pair: MatchPair): boolean {
    return this.pairs.has(MatchSet.keyOf(pair));
  }

  get size(): number {
    return this.pairs.size;
  }

  /** Iterates in insertion order; use toSortedArray for the result order */
  [Symbol.iterator](): Iterator<MatchPair> {
    return this.pairs.values();
  }

  toSortedArray(): MatchPair[] {
    return [...this.pairs.values()].sort(compareMatchPairs);
  }

  private static keyOf(pair: MatchPair): string {
    return `${pair.queryStart}:${pair.textStart}`;
  }
}
