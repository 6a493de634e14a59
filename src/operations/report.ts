/**
 * Human-readable match reports
 *
 * Mismatch counts are recomputed from the sequences rather than taken from
 * the matcher, so a report doubles as an independent check of its output.
 *
 * @module operations/report
 */

import { getErrorSuggestion, type SeedMatchError } from "../errors";
import type { MatchPair, MatchReportLine } from "../types";
import { hammingDistance } from "./core/hamming";

/**
 * Attach the matched windows and their mismatch counts to each pair
 */
export function describeMatches(
  query: string,
  text: string,
  n: number,
  pairs: readonly MatchPair[]
): MatchReportLine[] {
  return pairs.map(({ queryStart, textStart }) => {
    const queryWindow = query.substring(queryStart - 1, queryStart - 1 + n);
    const textWindow = text.substring(textStart - 1, textStart - 1 + n);
    return {
      queryStart,
      textStart,
      queryWindow,
      textWindow,
      mismatches: hammingDistance(queryWindow, textWindow),
    };
  });
}

/**
 * Format report lines, one per match, or a single "No matches found." line
 *
 * @example
 * ```typescript
 * formatMatchReport(describeMatches("AAAA", "AAAT", 4, [{ queryStart: 1, textStart: 1 }]), 4);
 * // ["Found matches at (query_start, text_start):", "  q[1:5] ≈ t[1:5]  → 1 mismatches"]
 * ```
 */
export function formatMatchReport(lines: readonly MatchReportLine[], n: number): string[] {
  if (lines.length === 0) {
    return ["No matches found."];
  }

  return [
    "Found matches at (query_start, text_start):",
    ...lines.map(
      ({ queryStart, textStart, mismatches }) =>
        `  q[${queryStart}:${queryStart + n}] ≈ t[${textStart}:${textStart + n}]  → ${mismatches} mismatches`
    ),
  ];
}

/**
 * Format a library error with its suggested fix, if one is known
 */
export function formatErrorReport(error: SeedMatchError): string[] {
  const lines = [`${error.name}: ${error.message}`];
  const suggestion = getErrorSuggestion(error);
  if (suggestion !== undefined) {
    lines.push(`Suggestion: ${suggestion}`);
  }
  return lines;
}
