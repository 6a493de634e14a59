/**
 * Seed indexing for l-mer filtration
 *
 * A seed index maps every l-mer of one query window to the offsets where it
 * occurs inside that window. Scanning the text for indexed l-mers yields the
 * candidate alignments that the matcher then verifies.
 *
 * @module seed-index
 */

import type { SeedCandidate, SeedIndex } from "../../types";

/**
 * Index every l-mer of `block` by value
 *
 * Offsets for a repeated l-mer are kept in ascending order.
 *
 * @example
 * ```typescript
 * const index = buildSeedIndex("ACAC", 2);
 * index.get("AC"); // [0, 2]
 * index.get("CA"); // [1]
 * ```
 */
export function buildSeedIndex(block: string, l: number): SeedIndex {
  const index = new Map<string, number[]>();
  if (l <= 0 || l > block.length) return index;

  for (let r = 0; r <= block.length - l; r++) {
    const lmer = block.substring(r, r + l);
    const offsets = index.get(lmer);
    if (offsets === undefined) {
      index.set(lmer, [r]);
    } else {
      offsets.push(r);
    }
  }

  return index;
}

/**
 * Slide an l-length window over `text` and yield one candidate for every
 * (text l-mer, recorded offset) pair found in the index.
 *
 * Candidates come out in ascending text offset, then ascending seed offset.
 * Bounds are not checked here; `candidateStart` can be negative or leave too
 * little text for a full alignment.
 */
export function* seedCandidates(
  index: SeedIndex,
  text: string,
  l: number
): Generator<SeedCandidate> {
  if (l <= 0 || index.size === 0) return;

  for (let j = 0; j <= text.length - l; j++) {
    const offsets = index.get(text.substring(j, j + l));
    if (offsets === undefined) continue;

    for (const r of offsets) {
      yield { textOffset: j, seedOffset: r, candidateStart: j - r };
    }
  }
}
