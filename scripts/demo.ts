#!/usr/bin/env -S npx tsx
/**
 * Demo: embed a mutated piece of a random text in a random query and find it
 *
 * Usage: npm run demo -- [seed] [n] [k]
 */

import {
  createSeededRandom,
  describeMatches,
  embedMutatedQuery,
  formatErrorReport,
  formatMatchReport,
  generateRandomSequence,
  queryMatch,
  SeedMatchError,
} from "../src/index";

const m = 200; // length of text
const p = 60; // length of query

function parseIntArg(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function main(): void {
  const rng = createSeededRandom(parseIntArg(process.argv[2], Date.now()));
  const n = parseIntArg(process.argv[3], 15); // length of each match
  const k = parseIntArg(process.argv[4], 2); // max mismatches allowed

  const text = generateRandomSequence(m, rng);
  const { query } = embedMutatedQuery({ text, queryLength: p, n, k, rng });

  console.log(`Text (len=${m}): ${text}`);
  console.log(`Query (len=${p}): ${query}`);
  console.log(`Searching for all ${n}-mers in query vs. text with ≤${k} mismatches...\n`);

  const hits = queryMatch(query, text, n, k);
  for (const line of formatMatchReport(describeMatches(query, text, n, hits), n)) {
    console.log(line);
  }
}

try {
  main();
} catch (error) {
  if (!(error instanceof SeedMatchError)) throw error;
  for (const line of formatErrorReport(error)) {
    console.error(line);
  }
  process.exitCode = 1;
}
