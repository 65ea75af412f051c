/**
 * Report module public API.
 * Modules import from other modules via index.ts only - no deep imports.
 */
export { GREETING_IDENTITY, runReport } from "./service.js";
export {
  buildReportLines,
  describeReportError,
  enumerate,
  parseRecord,
  serializeRecord,
  toReportRecord,
} from "./transform.js";
export type { InvalidCountError, ReportError } from "./errors.js";
export type { ReportRecord, ReportRequest } from "./schema.js";
export { ReportRecordSchema } from "./schema.js";
