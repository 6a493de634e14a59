/**
 * Core matching primitives
 *
 * @module operations/core
 */

export { bruteForceQueryMatch } from "./brute-force";
export { boundedHammingDistance, countMismatches, hammingDistance } from "./hamming";
export { compareMatchPairs, MatchSet } from "./match-set";
export { createSeededRandom, randomChoice, randomInt } from "./random";
export { buildSeedIndex, seedCandidates } from "./seed-index";
