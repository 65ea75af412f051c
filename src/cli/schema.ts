/**
 * CLI shapes: where lines go and what the process exits with.
 */

/**
 * Line-oriented output destination.
 */
export type OutputSink = Readonly<{
  writeLine: (line: string) => void;
}>;

export type CliIo = Readonly<{
  stdout: OutputSink;
  stderr: OutputSink;
}>;

/**
 * 0 on success, one code per failure kind otherwise.
 */
export type ExitCode = 0 | 2 | 3 | 4;
