/**
 * Report transformations - pure functions with no side effects.
 * Each function does ONE thing: (input: A) => B
 */
import { Result, err, ok } from "neverthrow";
import type { ZodIssue } from "zod";
import {
  type ReportError,
  invalidCountError,
  malformedRecordError,
  validationError,
} from "./errors.js";
import {
  type ReportRecord,
  ReportRecordSchema,
  type ReportRequest,
} from "./schema.js";

// =============================================================================
// Record Construction
// =============================================================================

/**
 * Validates a request and builds the frozen record from it.
 * Count problems win over item problems, so a bad count always reports
 * INVALID_COUNT.
 */
export const toReportRecord = (
  request: ReportRequest,
): Result<ReportRecord, ReportError> => {
  const parsed = ReportRecordSchema.safeParse(request);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const countIssue = parsed.error.issues.find(
    (issue) => issue.path[0] === "count",
  );
  if (countIssue) {
    return err(invalidCountError(request.count, countIssue.message));
  }

  return err(validationError(parsed.error.issues));
};

// =============================================================================
// Enumeration
// =============================================================================

/**
 * Lazy sequence 0, 1, ..., count - 1. Every iteration starts over from 0.
 *
 * @example
 * [...enumerate(3)] // [0, 1, 2]
 */
export const enumerate = (count: number): Iterable<number> => ({
  *[Symbol.iterator]() {
    for (let value = 0; value < count; value += 1) {
      yield value;
    }
  },
});

// =============================================================================
// Canonical Serialization
// =============================================================================

/**
 * Record keys in declaration order.
 */
const RECORD_KEYS = ["count", "items"] as const satisfies ReadonlyArray<
  keyof ReportRecord
>;

type RecordKey = (typeof RECORD_KEYS)[number];

const serializeInteger = (value: number): string => value.toString(10);

const serializeList = (values: ReadonlyArray<number>): string =>
  `[${values.map(serializeInteger).join(", ")}]`;

const serializeField = (record: ReportRecord, key: RecordKey): string => {
  switch (key) {
    case "count":
      return serializeInteger(record.count);
    case "items":
      return serializeList(record.items);
  }
};

/**
 * Canonical text of a record: keys in declaration order, `": "` after each
 * key, `", "` between members.
 *
 * @example
 * serializeRecord({ count: 3, items: [1, 2, 3] })
 * // '{"count": 3, "items": [1, 2, 3]}'
 */
export const serializeRecord = (record: ReportRecord): string => {
  const members = RECORD_KEYS.map(
    (key) => `${JSON.stringify(key)}: ${serializeField(record, key)}`,
  );
  return `{${members.join(", ")}}`;
};

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => (error instanceof Error ? error.message : String(error)),
);

/**
 * Reads a serialized record line back into a record.
 */
export const parseRecord = (line: string): Result<ReportRecord, ReportError> =>
  parseJson(line)
    .mapErr((reason) => malformedRecordError(line, reason))
    .andThen((value): Result<ReportRecord, ReportError> => {
      const parsed = ReportRecordSchema.safeParse(value);
      return parsed.success
        ? ok(parsed.data)
        : err(validationError(parsed.error.issues));
    });

// =============================================================================
// Report Assembly
// =============================================================================

/**
 * Lays out the report: counters, then the greeting when there is one, then
 * the serialized record.
 */
export const buildReportLines = (
  record: ReportRecord,
  greeting: string | undefined,
): ReadonlyArray<string> => [
  ...Array.from(enumerate(record.count), serializeInteger),
  ...(greeting === undefined ? [] : [greeting]),
  serializeRecord(record),
];

const formatIssues = (issues: ReadonlyArray<ZodIssue>): string =>
  issues
    .map((issue) =>
      issue.path.length === 0
        ? issue.message
        : `${issue.path.join(".")}: ${issue.message}`,
    )
    .join("; ");

/**
 * Human-readable message for a report failure.
 *
 * @example
 * describeReportError({ type: "INVALID_COUNT", count: -1, reason: "Count must not be negative" })
 * // "Invalid count -1: Count must not be negative"
 */
export const describeReportError = (error: ReportError): string => {
  switch (error.type) {
    case "INVALID_COUNT":
      return `Invalid count ${error.count}: ${error.reason}`;
    case "INVALID_IDENTITY":
      return `Invalid identity ${JSON.stringify(error.identity)}: ${formatIssues(
        error.issues,
      )}`;
    case "VALIDATION_FAILED":
      return `Invalid report input: ${formatIssues(error.issues)}`;
    case "MALFORMED_RECORD":
      return `Malformed record ${JSON.stringify(error.text)}: ${error.reason}`;
  }
};
