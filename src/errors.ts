/**
 * Error handling for approximate n-mer matching
 *
 * Every failure the library raises is a SeedMatchError carrying a stable
 * code, so callers can branch on `error.code` without string matching.
 */

/**
 * Base error class for all seedmatch errors
 */
export class SeedMatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SeedMatchError";
  }

  /**
   * Render the error with its context line, if any
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid parameters or options passed to a matcher entry point
 */
export class ValidationError extends SeedMatchError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Raised when `k + 1 > n` leaves no usable seed length and the
 * seed policy is "reject"
 */
export class SeedLengthError extends ValidationError {
  constructor(
    public readonly n: number,
    public readonly k: number
  ) {
    super(
      `Seed length floor(n / (k + 1)) is 0 for n=${n}, k=${k}; need k < n`,
      `Use seedPolicy "clamp" to match with 1-character seeds`
    );
    this.name = "SeedLengthError";
  }
}

/**
 * Matching stopped because the caller's AbortSignal fired
 */
export class MatchAbortedError extends SeedMatchError {
  constructor(
    /** 0-based query offset whose window was about to be processed */
    public readonly queryOffset: number,
    public readonly reason?: unknown
  ) {
    super(`Matching aborted before query offset ${queryOffset}`, "MATCH_ABORTED");
    this.name = "MatchAbortedError";
  }
}

/**
 * Suggested fixes keyed by error code
 */
export const ERROR_SUGGESTIONS = {
  VALIDATION_ERROR: "Check that n is a positive integer and k a non-negative integer",
  MATCH_ABORTED: "The AbortSignal passed in options was triggered",
} as const;

/**
 * Look up a suggestion for a library error
 */
export function getErrorSuggestion(error: SeedMatchError): string | undefined {
  if (error instanceof SeedLengthError) {
    return error.context;
  }
  if (error.code === "VALIDATION_ERROR" || error.code === "MATCH_ABORTED") {
    return ERROR_SUGGESTIONS[error.code];
  }
  return undefined;
}
