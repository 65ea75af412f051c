#!/usr/bin/env node
/**
 * hello-report - Application Entry Point
 *
 * Runs the sample report once and exits with its code.
 */
import { createStreamSink, runCli } from "./cli/index.js";

process.exitCode = runCli({
  stdout: createStreamSink(process.stdout),
  stderr: createStreamSink(process.stderr),
});

// --- Example usage (run with: npm start) ---
// 0
// 1
// 2
// Hello, world
// {"count": 3, "items": [1, 2, 3]}
