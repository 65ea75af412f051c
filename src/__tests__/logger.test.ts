/**
 * Logger tests - every logger writes to stderr so stdout stays the report.
 */
import { beforeEach, describe, expect, it, vi } from "vitest";

const { mockConfig, pinoMock, destinationMock } = vi.hoisted(() => {
  const destinationMock = vi.fn((fd: number) => ({ fd }));
  const pinoMock = Object.assign(
    vi.fn((_options: unknown, _stream?: unknown) => ({ info: vi.fn() })),
    { destination: destinationMock },
  );
  return {
    mockConfig: {
      NODE_ENV: "production",
      APP_NAME: "hello-report",
      LOG_LEVEL: "debug",
    },
    pinoMock,
    destinationMock,
  };
});

vi.mock("pino", () => ({ default: pinoMock }));

// Mock config before importing logger
vi.mock("../config.js", () => ({ config: mockConfig }));

import { createLogger } from "../logger.js";

describe("createLogger", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockConfig.NODE_ENV = "production";
  });

  it("writes JSON logs to stderr in production", () => {
    createLogger("report");

    expect(destinationMock).toHaveBeenCalledWith(2);
    expect(pinoMock).toHaveBeenCalledWith(
      { name: "report", level: "debug" },
      { fd: 2 },
    );
  });

  it("points the pretty transport at stderr in development", () => {
    mockConfig.NODE_ENV = "development";

    createLogger("cli");

    expect(destinationMock).not.toHaveBeenCalled();
    expect(pinoMock).toHaveBeenCalledTimes(1);
    expect(pinoMock).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "cli",
        level: "debug",
        transport: expect.objectContaining({
          target: "pino-pretty",
          options: expect.objectContaining({ destination: 2 }),
        }),
      }),
    );
  });
});
