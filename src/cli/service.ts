/**
 * CLI service - runs the sample report and hands its lines to the sinks.
 */
import { config } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type ReportRequest,
  describeReportError,
  runReport,
} from "../report/index.js";
import type { CliIo, ExitCode, OutputSink } from "./schema.js";
import { EXIT_SUCCESS, exitCodeFor } from "./transform.js";

const log = createLogger("cli");

/**
 * Inputs the command reports on.
 */
export const SAMPLE_REQUEST: ReportRequest = Object.freeze({
  count: 3,
  items: Object.freeze([1, 2, 3]),
});

/**
 * Sink writing one newline-terminated line per call to a stream.
 */
export const createStreamSink = (
  stream: NodeJS.WritableStream,
): OutputSink => ({
  writeLine: (line) => {
    stream.write(`${line}\n`);
  },
});

/**
 * Run the report and write it out.
 * Report lines go to stdout only on success; a failure writes a single
 * message to stderr and nothing to stdout.
 */
export const runCli = (
  io: CliIo,
  request: ReportRequest = SAMPLE_REQUEST,
): ExitCode => {
  const startTime = Date.now();
  logOperationStart(log, "runCli", { app: config.APP_NAME });

  const result = runReport(request.count, request.items);

  if (result.isErr()) {
    const message = describeReportError(result.error);
    logOperationFailed(log, "runCli", message, {
      errorType: result.error.type,
    });
    io.stderr.writeLine(message);
    return exitCodeFor(result.error);
  }

  for (const line of result.value) {
    io.stdout.writeLine(line);
  }

  logOperationComplete(log, "runCli", startTime, {
    lineCount: result.value.length,
  });

  return EXIT_SUCCESS;
};
