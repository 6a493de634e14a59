/**
 * Option types for matcher entry points
 *
 * @module operations/types
 */

import type { RandomSource, SeedPolicy } from "../types";

/**
 * Options for queryMatch and queryMatchDetailed
 */
export interface QueryMatchOptions {
  /**
   * What to do when k + 1 > n leaves no seed length.
   * @default "reject"
   */
  seedPolicy?: SeedPolicy;

  /**
   * When false, both sequences are upper-cased before matching.
   * Reported offsets are unaffected.
   * @default true
   */
  caseSensitive?: boolean;

  /**
   * Checked before each query window; once aborted the call throws
   * MatchAbortedError and returns nothing.
   */
  signal?: AbortSignal;
}

/**
 * Options for the concurrent matcher
 */
export interface ConcurrentMatchOptions extends QueryMatchOptions {
  /**
   * Number of shards matched at once.
   * @default 4
   */
  concurrency?: number;

  /**
   * Query windows per shard.
   * @default 64
   */
  shardSize?: number;
}

/**
 * Options for embedding a mutated copy of a text region into a query
 */
export interface EmbedQueryOptions {
  /** Text to copy the seed region from */
  text: string;
  /** Total query length p; must be >= n */
  queryLength: number;
  /** Length of the copied region */
  n: number;
  /** Number of random substitutions applied to the copied region */
  k: number;
  rng: RandomSource;
  /** @default "ACGT" */
  alphabet?: string;
}

/**
 * A generated query and where its embedded region came from
 */
export interface EmbeddedQuery {
  query: string;
  /** 0-based offset of the copied region in the text */
  sourceStart: number;
  /** 0-based offset of the mutated region in the query */
  queryStart: number;
  /** The mutated region as placed in the query */
  mutated: string;
}
