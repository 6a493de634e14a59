import { describe, expect, test } from "vitest";
import {
  ERROR_SUGGESTIONS,
  getErrorSuggestion,
  MatchAbortedError,
  SeedLengthError,
  SeedMatchError,
  ValidationError,
} from "../src/errors";

describe("SeedMatchError", () => {
  test("includes context in toString", () => {
    const error = new SeedMatchError("failed", "SOME_CODE", "while testing");
    expect(error.toString()).toBe("SeedMatchError: failed\nContext: while testing");
  });

  test("omits an empty context", () => {
    expect(new SeedMatchError("failed", "SOME_CODE", "").toString()).toBe(
      "SeedMatchError: failed"
    );
  });
});

describe("SeedLengthError", () => {
  test("is a validation error carrying n and k", () => {
    const error = new SeedLengthError(2, 2);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(SeedMatchError);
    expect(error.name).toBe("SeedLengthError");
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.n).toBe(2);
    expect(error.k).toBe(2);
    expect(error.message).toBe("Seed length floor(n / (k + 1)) is 0 for n=2, k=2; need k < n");
  });
});

describe("MatchAbortedError", () => {
  test("records the offset reached and the abort reason", () => {
    const error = new MatchAbortedError(7, "timeout");

    expect(error.code).toBe("MATCH_ABORTED");
    expect(error.queryOffset).toBe(7);
    expect(error.reason).toBe("timeout");
    expect(error.message).toBe("Matching aborted before query offset 7");
  });
});

describe("getErrorSuggestion", () => {
  test("suggests the clamp policy for seed length errors", () => {
    expect(getErrorSuggestion(new SeedLengthError(1, 3))).toBe(
      'Use seedPolicy "clamp" to match with 1-character seeds'
    );
  });

  test("looks suggestions up by code", () => {
    expect(getErrorSuggestion(new ValidationError("bad"))).toBe(ERROR_SUGGESTIONS.VALIDATION_ERROR);
    expect(getErrorSuggestion(new MatchAbortedError(0))).toBe(ERROR_SUGGESTIONS.MATCH_ABORTED);
  });

  test("returns undefined for unknown codes", () => {
    expect(getErrorSuggestion(new SeedMatchError("x", "OTHER"))).toBeUndefined();
  });
});
