import { Effect } from "effect";
import { describe, expect, test } from "vitest";
import { MatchAbortedError, SeedLengthError, ValidationError } from "../../src/errors";
import {
  partitionQueryOffsets,
  queryMatchConcurrent,
  queryMatchEffect,
} from "../../src/operations/concurrent-match";
import { createSeededRandom } from "../../src/operations/core/random";
import { queryMatch } from "../../src/operations/query-match";
import { generateRandomSequence } from "../../src/operations/sequence-generation";

describe("partitionQueryOffsets", () => {
  test("splits offsets into contiguous shards", () => {
    expect(partitionQueryOffsets(5, 2)).toEqual([
      { start: 0, length: 2 },
      { start: 2, length: 2 },
      { start: 4, length: 1 },
    ]);
  });

  test("returns one shard when it fits", () => {
    expect(partitionQueryOffsets(4, 4)).toEqual([{ start: 0, length: 4 }]);
  });

  test("returns no shards for no windows", () => {
    expect(partitionQueryOffsets(0, 4)).toEqual([]);
  });

  test("rejects non-positive shard sizes", () => {
    expect(() => partitionQueryOffsets(5, 0)).toThrow(ValidationError);
  });
});

describe("queryMatchConcurrent", () => {
  test("matches the sequential result", async () => {
    const rng = createSeededRandom(2024);
    const query = generateRandomSequence(50, rng, "ACG");
    const text = generateRandomSequence(150, rng, "ACG");

    const concurrent = await queryMatchConcurrent(query, text, 8, 2, {
      concurrency: 3,
      shardSize: 5,
    });

    expect(concurrent).toEqual(queryMatch(query, text, 8, 2));
  });

  test("uses the default sharding", async () => {
    expect(await queryMatchConcurrent("AACGTACGT", "TTACGTACGTTT", 4, 0)).toEqual(
      queryMatch("AACGTACGT", "TTACGTACGTTT", 4, 0)
    );
  });

  test("returns empty for infeasible lengths", async () => {
    expect(await queryMatchConcurrent("ACG", "ACGTACGT", 4, 0)).toEqual([]);
  });

  test("rejects invalid parameters", async () => {
    await expect(queryMatchConcurrent("ACGT", "ACGT", 0, 0)).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(queryMatchConcurrent("ACGT", "ACGT", 2, 2)).rejects.toBeInstanceOf(
      SeedLengthError
    );
  });

  test("rejects invalid concurrency options", async () => {
    await expect(
      queryMatchConcurrent("ACGT", "ACGT", 2, 0, { shardSize: 0 })
    ).rejects.toThrow("Invalid concurrency options");
    await expect(
      queryMatchConcurrent("ACGT", "ACGT", 2, 0, { concurrency: 1.5 })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  test("rejects with MatchAbortedError when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      queryMatchConcurrent("ACGTACGT", "ACGTACGT", 4, 0, { signal: controller.signal })
    ).rejects.toBeInstanceOf(MatchAbortedError);
  });

  test("stops a running match when the signal is aborted", async () => {
    // Unaborted, this input takes seconds to match
    const rng = createSeededRandom(4242);
    const query = generateRandomSequence(3000, rng, "AC");
    const text = generateRandomSequence(3000, rng, "AC");
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort("late"), 5);

    const started = Date.now();
    let caught: unknown;
    try {
      await queryMatchConcurrent(query, text, 12, 3, {
        signal: controller.signal,
        shardSize: 8,
      });
    } catch (error) {
      caught = error;
    } finally {
      clearTimeout(timer);
    }
    const elapsed = Date.now() - started;

    expect(caught).toBeInstanceOf(MatchAbortedError);
    if (caught instanceof MatchAbortedError) {
      expect(caught.reason).toBe("late");
    }
    expect(elapsed).toBeLessThan(1500);
  });
});

describe("queryMatchEffect", () => {
  test("can be run with the Effect runtime", async () => {
    const matches = await Effect.runPromise(queryMatchEffect("AAAA", "AAAT", 4, 1));
    expect(matches).toEqual([{ queryStart: 1, textStart: 1 }]);
  });

  test("fails in the error channel instead of throwing", async () => {
    const error = await Effect.runPromise(Effect.flip(queryMatchEffect("ACGT", "ACGT", 4, -1)));
    expect(error).toBeInstanceOf(ValidationError);
  });
});
