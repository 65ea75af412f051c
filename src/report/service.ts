/**
 * Report service - orchestrates transformations and the greeter.
 * This is the "imperative shell" that wraps pure functions.
 */
import { type Result, err, ok } from "neverthrow";
import { createGreeter } from "../greeter/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "../logger.js";
import type { ReportError } from "./errors.js";
import type { ReportRequest } from "./schema.js";
import { buildReportLines, toReportRecord } from "./transform.js";

const log = createLogger("report");

/**
 * Identity every report greets.
 */
export const GREETING_IDENTITY = "world";

/**
 * Run a report over `count` counters and `items`.
 * Validates the inputs, greets when there are items, then lays out the lines.
 * A failed run yields no lines at all.
 */
export const runReport = (
  count: number,
  items: ReadonlyArray<number>,
): Result<ReadonlyArray<string>, ReportError> => {
  const startTime = Date.now();
  const request: ReportRequest = { count, items };
  logOperationStart(log, "runReport", { count, itemCount: items.length });

  // Step 1: Validate inputs and build the record
  const recordResult = toReportRecord(request);
  if (recordResult.isErr()) {
    log.warn(
      { operation: "runReport", error: recordResult.error },
      "  ↳ Validation failed",
    );
    return err(recordResult.error);
  }
  const record = recordResult.value;

  log.debug({ operation: "runReport", record }, "  ↳ Record built");

  // Step 2: Greet only when there are items
  let greeting: string | undefined;
  if (record.items.length > 0) {
    const greeterResult = createGreeter(GREETING_IDENTITY);
    if (greeterResult.isErr()) {
      log.warn(
        { operation: "runReport", error: greeterResult.error },
        "  ↳ Greeter construction failed",
      );
      return err(greeterResult.error);
    }
    greeting = greeterResult.value.greet();
  }

  // Step 3: Lay out the lines
  const lines = buildReportLines(record, greeting);

  logOperationComplete(log, "runReport", startTime, {
    lineCount: lines.length,
    greeted: greeting !== undefined,
  });

  return ok(lines);
};
