/**
 * Approximate n-mer matching by l-mer filtration
 *
 * Finds every pair of length-n substrings, one from the query and one from
 * the text, that differ in at most k positions. Any two such n-mers share an
 * exact l-mer at the same relative offset when l = floor(n / (k + 1)): the
 * k mismatches can touch at most k of the k + 1 disjoint l-blocks. So for
 * each query window we index its l-mers, look every text l-mer up in that
 * index, and verify the alignment each hit implies.
 *
 * @module operations/query-match
 *
 * @remarks
 * Cost per query window is O(n) to build the seed index and O(m) index
 * lookups, plus O(n) per in-bounds candidate. Small l (k close to n) lets
 * many spurious candidates through; the worst case is O(p * m * n).
 *
 * @example
 * ```typescript
 * queryMatch("AAAA", "AAAT", 4, 1); // [{ queryStart: 1, textStart: 1 }]
 * ```
 */

import { type } from "arktype";
import { MatchAbortedError, SeedLengthError, ValidationError } from "../errors";
import type { MatchPair, MatchResult, MatchStats, SeedPolicy } from "../types";
import { countMismatches } from "./core/hamming";
import { MatchSet } from "./core/match-set";
import { buildSeedIndex, seedCandidates } from "./core/seed-index";
import type { QueryMatchOptions } from "./types";

const MatchParametersSchema = type({
  query: "string",
  text: "string",
  n: "number.integer > 0",
  k: "number.integer >= 0",
  "seedPolicy?": "'reject' | 'clamp' | undefined",
  "caseSensitive?": "boolean | undefined",
});

/**
 * Validated inputs for one matching run
 */
export interface MatchPlan {
  readonly query: string;
  readonly text: string;
  readonly n: number;
  readonly k: number;
  /** Seed length after the seed policy is applied */
  readonly l: number;
  /** Number of query windows, 0 when n exceeds either input */
  readonly windowCount: number;
}

/**
 * Seed length used for (n, k)
 *
 * @throws {SeedLengthError} When floor(n / (k + 1)) is 0 under the "reject" policy
 *
 * @example
 * ```typescript
 * seedLength(15, 2); // 5
 * seedLength(3, 5, "clamp"); // 1
 * ```
 */
export function seedLength(n: number, k: number, policy: SeedPolicy = "reject"): number {
  const l = Math.floor(n / (k + 1));
  if (l >= 1) return l;
  if (policy === "clamp") return 1;
  throw new SeedLengthError(n, k);
}

/**
 * Validate parameters and prepare the inputs for matching.
 *
 * Parameter checks run before the length check, so an invalid (n, k) is
 * reported even when the sequences are too short to match anyway.
 *
 * @throws {ValidationError} For non-integer or out-of-range n and k
 * @throws {SeedLengthError} For k >= n under the "reject" policy
 */
export function resolveMatchPlan(
  query: string,
  text: string,
  n: number,
  k: number,
  options: QueryMatchOptions = {}
): MatchPlan {
  const result = MatchParametersSchema({
    query,
    text,
    n,
    k,
    seedPolicy: options.seedPolicy,
    caseSensitive: options.caseSensitive,
  });

  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid match parameters: ${result.summary}`);
  }

  const l = seedLength(n, k, options.seedPolicy);
  const caseSensitive = options.caseSensitive ?? true;
  const feasible = n <= query.length && n <= text.length;

  return {
    query: caseSensitive ? query : foldCase(query),
    text: caseSensitive ? text : foldCase(text),
    n,
    k,
    l,
    windowCount: feasible ? query.length - n + 1 : 0,
  };
}

/**
 * Find all 1-based (queryStart, textStart) pairs whose n-mers differ in at
 * most k positions, deduplicated and sorted ascending.
 *
 * Returns an empty array when n is longer than the query or the text.
 *
 * @throws {ValidationError} For invalid n, k or options
 * @throws {SeedLengthError} For k >= n unless seedPolicy is "clamp"
 * @throws {MatchAbortedError} When options.signal is aborted
 */
export function queryMatch(
  query: string,
  text: string,
  n: number,
  k: number,
  options: QueryMatchOptions = {}
): MatchPair[] {
  return queryMatchDetailed(query, text, n, k, options).matches;
}

/**
 * Same as queryMatch, also reporting how many candidates the seed filter
 * produced and how many survived verification
 */
export function queryMatchDetailed(
  query: string,
  text: string,
  n: number,
  k: number,
  options: QueryMatchOptions = {}
): MatchResult {
  const plan = resolveMatchPlan(query, text, n, k, options);
  const stats = createMatchStats(plan);
  const matches = new MatchSet();

  for (let i = 0; i < plan.windowCount; i++) {
    throwIfAborted(options.signal, i);
    matchQueryWindow(plan, i, matches, stats);
  }

  stats.matches = matches.size;
  return { matches: matches.toSortedArray(), stats };
}

/**
 * Seed, scan and verify a single query window, adding hits to `sink`.
 *
 * Windows are independent of each other, which is what lets the concurrent
 * matcher run them in any order.
 */
export function matchQueryWindow(
  plan: MatchPlan,
  queryOffset: number,
  sink: MatchSet,
  stats?: MatchStats
): void {
  const { query, text, n, k, l } = plan;
  const block = query.substring(queryOffset, queryOffset + n);
  const index = buildSeedIndex(block, l);

  for (const candidate of seedCandidates(index, text, l)) {
    if (stats) stats.seedHits++;

    const textStart = candidate.candidateStart;
    if (textStart < 0 || textStart + n > text.length) {
      if (stats) stats.outOfBounds++;
      continue;
    }

    if (stats) stats.candidates++;
    if (countMismatches(block, 0, text, textStart, n, k) <= k) {
      sink.add({ queryStart: queryOffset + 1, textStart: textStart + 1 });
    } else if (stats) {
      stats.rejected++;
    }
  }
}

/**
 * Throw MatchAbortedError if the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, queryOffset: number): void {
  if (signal?.aborted === true) {
    throw new MatchAbortedError(queryOffset, signal.reason);
  }
}

function createMatchStats(plan: MatchPlan): MatchStats {
  return {
    seedLength: plan.l,
    queryWindows: plan.windowCount,
    seedHits: 0,
    candidates: 0,
    outOfBounds: 0,
    rejected: 0,
    matches: 0,
  };
}

// Upper-case one character at a time so offsets never shift
function foldCase(sequence: string): string {
  let folded = "";
  for (const ch of sequence) {
    const upper = ch.toUpperCase();
    folded += upper.length === ch.length ? upper : ch;
  }
  return folded;
}
