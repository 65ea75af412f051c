/**
 * CLI transformations - pure mapping from failures to exit codes.
 */
import type { ReportError } from "../report/index.js";
import type { ExitCode } from "./schema.js";

export const EXIT_SUCCESS: ExitCode = 0;

/**
 * Exit code for a failed run.
 *
 * @example
 * exitCodeFor({ type: "INVALID_COUNT", count: -1, reason: "..." }) // 2
 */
export const exitCodeFor = (error: ReportError): ExitCode => {
  switch (error.type) {
    case "INVALID_COUNT":
      return 2;
    case "INVALID_IDENTITY":
      return 3;
    case "VALIDATION_FAILED":
    case "MALFORMED_RECORD":
      return 4;
  }
};
