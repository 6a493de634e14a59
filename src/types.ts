/**
 * Core data types for approximate n-mer matching
 *
 * @module types
 */

/**
 * A contiguous region of a sequence.
 *
 * Used for query shards in the concurrent matcher and for describing
 * n-mer and l-mer windows.
 */
export interface Window {
  /** 0-based start offset */
  readonly start: number;
  readonly length: number;
}

/**
 * Mapping from an l-mer to the ascending offsets where it occurs inside
 * one query window
 */
export type SeedIndex = ReadonlyMap<string, readonly number[]>;

/**
 * One approximate n-mer occurrence.
 *
 * Both offsets are 1-based: `query[queryStart-1 .. queryStart-1+n)` and
 * `text[textStart-1 .. textStart-1+n)` differ in at most k positions.
 */
export interface MatchPair {
  readonly queryStart: number;
  readonly textStart: number;
}

/**
 * A candidate alignment derived from a shared seed, pending verification
 */
export interface SeedCandidate {
  /** 0-based offset of the seed in the text */
  readonly textOffset: number;
  /** 0-based offset of the seed inside the query window */
  readonly seedOffset: number;
  /** textOffset - seedOffset; may fall outside the text */
  readonly candidateStart: number;
}

/**
 * How to handle (n, k) combinations where floor(n / (k + 1)) is 0.
 *
 * - `reject`: throw SeedLengthError
 * - `clamp`: use 1-character seeds; pairs with no aligned equal character
 *   are then not found
 */
export type SeedPolicy = "reject" | "clamp";

/**
 * Counters describing how well the seed filter worked for one run
 */
export interface MatchStats {
  /** Seed length l actually used */
  seedLength: number;
  /** Number of query windows processed (p - n + 1, or 0) */
  queryWindows: number;
  /** Text l-mers found in a seed index, counted once per recorded offset */
  seedHits: number;
  /** In-bounds candidates that went through Hamming verification */
  candidates: number;
  /** Candidates discarded because the alignment ran past either text end */
  outOfBounds: number;
  /** Verified candidates with distance > k (includes repeats of one pair) */
  rejected: number;
  /** Distinct pairs returned */
  matches: number;
}

/**
 * Result of a detailed run
 */
export interface MatchResult {
  readonly matches: MatchPair[];
  readonly stats: MatchStats;
}

/**
 * A match prepared for display, with the mismatch count recomputed
 * from the inputs
 */
export interface MatchReportLine extends MatchPair {
  readonly queryWindow: string;
  readonly textWindow: string;
  readonly mismatches: number;
}

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;
