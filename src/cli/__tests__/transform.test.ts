import { describe, expect, it } from "vitest";
import { EXIT_SUCCESS, exitCodeFor } from "../transform.js";

describe("exitCodeFor", () => {
  it("maps INVALID_COUNT to 2", () => {
    expect(
      exitCodeFor({ type: "INVALID_COUNT", count: -1, reason: "negative" }),
    ).toBe(2);
  });

  it("maps INVALID_IDENTITY to 3", () => {
    expect(
      exitCodeFor({ type: "INVALID_IDENTITY", identity: "", issues: [] }),
    ).toBe(3);
  });

  it("maps input and record failures to 4", () => {
    expect(exitCodeFor({ type: "VALIDATION_FAILED", issues: [] })).toBe(4);
    expect(
      exitCodeFor({ type: "MALFORMED_RECORD", text: "", reason: "empty" }),
    ).toBe(4);
  });

  it("uses 0 for success", () => {
    expect(EXIT_SUCCESS).toBe(0);
  });
});
