/**
 * CLI module public API.
 */
export { SAMPLE_REQUEST, createStreamSink, runCli } from "./service.js";
export { EXIT_SUCCESS, exitCodeFor } from "./transform.js";
export type { CliIo, ExitCode, OutputSink } from "./schema.js";
