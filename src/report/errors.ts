/**
 * Report module error types - typed error unions, not strings.
 * Errors carry context about what failed.
 */
import type { ZodIssue } from "zod";
import type { GreeterError } from "../greeter/index.js";

export type InvalidCountError = {
  readonly type: "INVALID_COUNT";
  readonly count: number;
  readonly reason: string;
};

/**
 * Typed error union for report operations.
 * Greeter failures pass through unchanged.
 */
export type ReportError =
  | InvalidCountError
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "MALFORMED_RECORD";
      readonly text: string;
      readonly reason: string;
    }
  | GreeterError;

/**
 * Helper to create invalid count error.
 */
export const invalidCountError = (
  count: number,
  reason: string,
): ReportError => ({
  type: "INVALID_COUNT",
  count,
  reason,
});

/**
 * Helper to create validation error.
 */
export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): ReportError => ({
  type: "VALIDATION_FAILED",
  issues,
});

/**
 * Helper to create malformed record error.
 */
export const malformedRecordError = (
  text: string,
  reason: string,
): ReportError => ({
  type: "MALFORMED_RECORD",
  text,
  reason,
});
