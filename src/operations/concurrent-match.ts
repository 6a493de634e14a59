/**
 * Sharded matching on Effect fibers
 *
 * Query windows never read each other's state, so the query offsets can be
 * split into contiguous shards and matched independently. Each shard fills
 * its own MatchSet; the shards are merged once at the end. Every shard
 * starts with a sleep, which hands control back to the event loop so that
 * timers and abort handlers run between shards. The signal itself is
 * checked before every window.
 *
 * @example Running the Effect directly
 * ```typescript
 * import { Effect } from "effect";
 *
 * const program = queryMatchEffect(query, text, 15, 2, { concurrency: 8 });
 * const matches = await Effect.runPromise(program);
 * ```
 *
 * @module operations/concurrent-match
 */

import { type } from "arktype";
import { Cause, Effect, Exit } from "effect";
import { MatchAbortedError, ValidationError } from "../errors";
import type { MatchPair, Window } from "../types";
import { MatchSet } from "./core/match-set";
import { type MatchPlan, matchQueryWindow, resolveMatchPlan } from "./query-match";
import type { ConcurrentMatchOptions } from "./types";

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_SHARD_SIZE = 64;

const ConcurrencySchema = type({
  "concurrency?": "number.integer > 0 | undefined",
  "shardSize?": "number.integer > 0 | undefined",
});

/**
 * Split query offsets [0, windowCount) into contiguous shards of at most
 * `shardSize` windows
 *
 * @example
 * ```typescript
 * partitionQueryOffsets(5, 2);
 * // [{ start: 0, length: 2 }, { start: 2, length: 2 }, { start: 4, length: 1 }]
 * ```
 */
export function partitionQueryOffsets(windowCount: number, shardSize: number): Window[] {
  if (!Number.isInteger(shardSize) || shardSize <= 0) {
    throw new ValidationError(`Shard size must be a positive integer, got ${shardSize}`);
  }

  const shards: Window[] = [];
  for (let start = 0; start < windowCount; start += shardSize) {
    shards.push({ start, length: Math.min(shardSize, windowCount - start) });
  }
  return shards;
}

/**
 * Effect that matches all query windows shard by shard.
 *
 * Produces the same pairs, in the same order, as queryMatch.
 */
export function queryMatchEffect(
  query: string,
  text: string,
  n: number,
  k: number,
  options: ConcurrentMatchOptions = {}
): Effect.Effect<MatchPair[], ValidationError | MatchAbortedError> {
  return Effect.gen(function* () {
    const plan = yield* Effect.try({
      try: () => resolveConcurrentPlan(query, text, n, k, options),
      catch: (error) =>
        error instanceof ValidationError ? error : new ValidationError(String(error)),
    });

    const shards = partitionQueryOffsets(
      plan.windowCount,
      options.shardSize ?? DEFAULT_SHARD_SIZE
    );

    const shardResults = yield* Effect.forEach(
      shards,
      (shard) => matchShard(plan, shard, options.signal),
      { concurrency: options.concurrency ?? DEFAULT_CONCURRENCY }
    );

    const merged = new MatchSet();
    for (const result of shardResults) {
      merged.addAll(result);
    }
    return merged.toSortedArray();
  });
}

/**
 * Run queryMatchEffect to completion
 *
 * @throws {ValidationError} For invalid parameters or options
 * @throws {MatchAbortedError} When options.signal is aborted before all windows finish
 */
export async function queryMatchConcurrent(
  query: string,
  text: string,
  n: number,
  k: number,
  options: ConcurrentMatchOptions = {}
): Promise<MatchPair[]> {
  const exit = await Effect.runPromiseExit(queryMatchEffect(query, text, n, k, options));

  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

function resolveConcurrentPlan(
  query: string,
  text: string,
  n: number,
  k: number,
  options: ConcurrentMatchOptions
): MatchPlan {
  const result = ConcurrencySchema({
    concurrency: options.concurrency,
    shardSize: options.shardSize,
  });

  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid concurrency options: ${result.summary}`);
  }

  return resolveMatchPlan(query, text, n, k, options);
}

function matchShard(
  plan: MatchPlan,
  shard: Window,
  signal: AbortSignal | undefined
): Effect.Effect<MatchSet, MatchAbortedError> {
  return Effect.gen(function* () {
    const local = new MatchSet();
    // yieldNow stays on the fiber scheduler; sleep goes through the event loop
    yield* Effect.sleep(0);

    for (let i = shard.start; i < shard.start + shard.length; i++) {
      if (signal?.aborted === true) {
        return yield* Effect.fail(new MatchAbortedError(i, signal.reason));
      }
      matchQueryWindow(plan, i, local);
    }

    return local;
  });
}
