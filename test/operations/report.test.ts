import { describe, expect, test } from "vitest";
import { SeedLengthError, SeedMatchError } from "../../src/errors";
import { queryMatch } from "../../src/operations/query-match";
import {
  describeMatches,
  formatErrorReport,
  formatMatchReport,
} from "../../src/operations/report";

describe("describeMatches", () => {
  test("recomputes windows and mismatch counts", () => {
    expect(describeMatches("AAAA", "AAAT", 4, [{ queryStart: 1, textStart: 1 }])).toEqual([
      {
        queryStart: 1,
        textStart: 1,
        queryWindow: "AAAA",
        textWindow: "AAAT",
        mismatches: 1,
      },
    ]);
  });

  test("uses 1-based offsets", () => {
    const [line] = describeMatches("GACGT", "TTACCT", 4, [{ queryStart: 2, textStart: 3 }]);
    expect(line).toEqual({
      queryStart: 2,
      textStart: 3,
      queryWindow: "ACGT",
      textWindow: "ACCT",
      mismatches: 1,
    });
  });
});

describe("formatMatchReport", () => {
  test("prints one line per match", () => {
    const lines = describeMatches("AACGTACGT", "TTACGTACGTTT", 4, [
      { queryStart: 2, textStart: 3 },
      { queryStart: 6, textStart: 7 },
    ]);

    expect(formatMatchReport(lines, 4)).toEqual([
      "Found matches at (query_start, text_start):",
      "  q[2:6] ≈ t[3:7]  → 0 mismatches",
      "  q[6:10] ≈ t[7:11]  → 0 mismatches",
    ]);
  });

  test("reports when nothing matched", () => {
    expect(formatMatchReport([], 15)).toEqual(["No matches found."]);
  });
});

describe("formatErrorReport", () => {
  test("adds the suggestion for a rejected seed length", () => {
    let caught: unknown;
    try {
      queryMatch("ACGTACGT", "ACGTACGT", 3, 3);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SeedLengthError);
    if (caught instanceof SeedLengthError) {
      expect(formatErrorReport(caught)).toEqual([
        "SeedLengthError: Seed length floor(n / (k + 1)) is 0 for n=3, k=3; need k < n",
        'Suggestion: Use seedPolicy "clamp" to match with 1-character seeds',
      ]);
    }
  });

  test("prints only the message when no suggestion is known", () => {
    expect(formatErrorReport(new SeedMatchError("odd failure", "OTHER"))).toEqual([
      "SeedMatchError: odd failure",
    ]);
  });
});
