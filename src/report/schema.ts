/**
 * Report module schemas - define data shapes BEFORE writing logic.
 * Schemas are the source of truth - derive types with z.infer<>.
 */
import { z } from "zod";

/**
 * Number of counter lines in a report.
 */
export const CountSchema = z
  .number()
  .int("Count must be an integer")
  .safe("Count must be a safe integer")
  .nonnegative("Count must not be negative")
  .describe("Number of enumerated lines");

/**
 * Items gate the greeting: any item at all means the report greets.
 */
export const ItemsSchema = z
  .array(
    z
      .number()
      .int("Items must be integers")
      .safe("Items must be safe integers"),
  )
  .readonly()
  .describe("Ordered sequence of integers");

/**
 * The record built once per report. Parsing copies the items and freezes
 * the result.
 */
export const ReportRecordSchema = z
  .object({
    count: CountSchema,
    items: ItemsSchema,
  })
  .readonly();

// Derived types - never define these separately from schemas
export type ReportRecord = z.infer<typeof ReportRecordSchema>;

/**
 * Inputs of a single report run, before validation.
 */
export type ReportRequest = Readonly<{
  count: number;
  items: ReadonlyArray<number>;
}>;
