/**
 * Random sequence generation for exercising the matcher
 *
 * All functions take an explicit RandomSource; pass createSeededRandom(seed)
 * for reproducible output.
 *
 * @module operations/sequence-generation
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { RandomSource } from "../types";
import { randomChoice, randomInt } from "./core/random";
import type { EmbeddedQuery, EmbedQueryOptions } from "./types";

export const DNA_ALPHABET = "ACGT";

const EmbedQuerySchema = type({
  text: "string",
  queryLength: "number.integer > 0",
  n: "number.integer > 0",
  k: "number.integer >= 0",
  alphabet: "string > 1",
}).narrow((options, ctx) => {
  if (options.n > options.queryLength) {
    return ctx.reject({
      expected: "n <= queryLength",
      actual: `n=${options.n}, queryLength=${options.queryLength}`,
    });
  }
  if (options.n > options.text.length) {
    return ctx.reject({
      expected: "n <= text length",
      actual: `n=${options.n}, text length=${options.text.length}`,
    });
  }
  return true;
});

/**
 * Random sequence of `length` letters drawn uniformly from `alphabet`
 *
 * @example
 * ```typescript
 * generateRandomSequence(8, createSeededRandom(7)); // e.g. "GATTACAG"
 * ```
 */
export function generateRandomSequence(
  length: number,
  rng: RandomSource,
  alphabet: string = DNA_ALPHABET
): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new ValidationError(`Sequence length must be a non-negative integer, got ${length}`);
  }
  if (alphabet.length === 0) {
    throw new ValidationError("Alphabet must not be empty");
  }

  let sequence = "";
  for (let i = 0; i < length; i++) {
    sequence += randomChoice(rng, alphabet);
  }
  return sequence;
}

/**
 * Apply `substitutions` random single-letter substitutions.
 *
 * Each substitution picks a position uniformly and replaces its letter with a
 * different letter of the alphabet. Positions may repeat, so the result can
 * differ from the input in fewer than `substitutions` places, never more.
 */
export function mutateSequence(
  sequence: string,
  substitutions: number,
  rng: RandomSource,
  alphabet: string = DNA_ALPHABET
): string {
  if (!Number.isInteger(substitutions) || substitutions < 0) {
    throw new ValidationError(
      `Substitution count must be a non-negative integer, got ${substitutions}`
    );
  }
  if (sequence.length === 0 || substitutions === 0) return sequence;

  const letters = sequence.split("");
  for (let s = 0; s < substitutions; s++) {
    const position = randomInt(rng, letters.length);
    const current = letters[position];
    const replacements = [...alphabet].filter((letter) => letter !== current);
    if (replacements.length === 0) {
      throw new ValidationError(
        `Alphabet "${alphabet}" has no letter to substitute for "${current ?? ""}"`
      );
    }
    letters[position] = randomChoice(rng, replacements);
  }
  return letters.join("");
}

/**
 * Build a query guaranteed to contain an approximate copy of part of `text`.
 *
 * An n-long region at a random text offset is copied, mutated with k
 * substitutions, and placed at `sourceStart mod (queryLength - n + 1)` in the
 * query, with random flanks filling it out to exactly `queryLength`.
 */
export function embedMutatedQuery(options: EmbedQueryOptions): EmbeddedQuery {
  const { text, queryLength, n, k, rng, alphabet = DNA_ALPHABET } = options;
  const result = EmbedQuerySchema({ text, queryLength, n, k, alphabet });

  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid embed options: ${result.summary}`);
  }

  const sourceStart = randomInt(rng, text.length - n + 1);
  const mutated = mutateSequence(text.substring(sourceStart, sourceStart + n), k, rng, alphabet);

  const flankTotal = queryLength - n;
  const queryStart = sourceStart % (flankTotal + 1);
  const left = generateRandomSequence(queryStart, rng, alphabet);
  const right = generateRandomSequence(flankTotal - queryStart, rng, alphabet);

  return {
    query: left + mutated + right,
    sourceStart,
    queryStart,
    mutated,
  };
}
