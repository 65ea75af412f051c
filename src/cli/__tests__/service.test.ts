/**
 * CLI Service Tests
 *
 * Runs the command against in-memory sinks.
 */
import { Writable } from "node:stream";
import { describe, expect, it, vi } from "vitest";

// Mock config before importing service
vi.mock("../../config.js", () => ({
  config: {
    NODE_ENV: "test",
    APP_NAME: "hello-report",
    LOG_LEVEL: "silent",
  },
}));

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import { SAMPLE_REQUEST, createStreamSink, runCli } from "../service.js";

const createMemoryIo = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    io: {
      stdout: { writeLine: (line: string) => stdout.push(line) },
      stderr: { writeLine: (line: string) => stderr.push(line) },
    },
  };
};

describe("runCli", () => {
  it("writes the sample report to stdout and exits 0", () => {
    const { io, stdout, stderr } = createMemoryIo();

    const exitCode = runCli(io);

    expect(exitCode).toBe(0);
    expect(stdout).toEqual([
      "0",
      "1",
      "2",
      "Hello, world",
      '{"count": 3, "items": [1, 2, 3]}',
    ]);
    expect(stderr).toEqual([]);
  });

  it("reports the fixed sample inputs", () => {
    expect(SAMPLE_REQUEST).toEqual({ count: 3, items: [1, 2, 3] });
  });

  it("writes only to stderr and exits 2 for a negative count", () => {
    const { io, stdout, stderr } = createMemoryIo();

    const exitCode = runCli(io, { count: -1, items: [1] });

    expect(exitCode).toBe(2);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(["Invalid count -1: Count must not be negative"]);
  });

  it("exits 4 for fractional items", () => {
    const { io, stdout, stderr } = createMemoryIo();

    const exitCode = runCli(io, { count: 1, items: [0.5] });

    expect(exitCode).toBe(4);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "Invalid report input: items.0: Items must be integers",
    ]);
  });
});

describe("createStreamSink", () => {
  it("terminates every line with a newline", async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    const sink = createStreamSink(stream);

    sink.writeLine("0");
    sink.writeLine("Hello, world");
    await new Promise((resolve) => setImmediate(resolve));

    expect(chunks.join("")).toBe("0\nHello, world\n");
  });
});
