/**
 * seedmatch - approximate n-mer matching under Hamming distance
 *
 * Finds every pair of length-n substrings of a query and a text that differ
 * in at most k positions, using l-mer filtration to avoid comparing every
 * window against every other.
 */

// Error types
export {
  ERROR_SUGGESTIONS,
  getErrorSuggestion,
  MatchAbortedError,
  SeedLengthError,
  SeedMatchError,
  ValidationError,
} from "./errors";
// Core primitives
export {
  boundedHammingDistance,
  bruteForceQueryMatch,
  buildSeedIndex,
  compareMatchPairs,
  countMismatches,
  createSeededRandom,
  hammingDistance,
  MatchSet,
  randomChoice,
  randomInt,
  seedCandidates,
} from "./operations/core";
// Concurrent matching
export {
  partitionQueryOffsets,
  queryMatchConcurrent,
  queryMatchEffect,
} from "./operations/concurrent-match";
// Matcher
export { queryMatch, queryMatchDetailed, seedLength } from "./operations/query-match";
// Reports
export { describeMatches, formatErrorReport, formatMatchReport } from "./operations/report";
// Test data generation
export {
  DNA_ALPHABET,
  embedMutatedQuery,
  generateRandomSequence,
  mutateSequence,
} from "./operations/sequence-generation";
export type {
  ConcurrentMatchOptions,
  EmbeddedQuery,
  EmbedQueryOptions,
  QueryMatchOptions,
} from "./operations/types";
export type {
  MatchPair,
  MatchReportLine,
  MatchResult,
  MatchStats,
  RandomSource,
  SeedCandidate,
  SeedIndex,
  SeedPolicy,
  Window,
} from "./types";
