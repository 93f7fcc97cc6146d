/**
 * Unit tests for the micro-logger formatting helpers
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as logger from "@/logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should resolve log levels case-insensitively with an info default", () => {
    expect(logger.resolveLogLevel("DEBUG")).toBe("debug");
    expect(logger.resolveLogLevel(" warn ")).toBe("warn");
    expect(logger.resolveLogLevel("verbose")).toBe("info");
    expect(logger.resolveLogLevel(undefined)).toBe("info");
  });

  it("should format one line with timestamp, level and meta", () => {
    const now = new Date("2026-01-01T00:00:00.000Z");

    expect(logger.formatLine("info", "Batch committed", { batch: 3, found: 1 }, now)).toBe(
      '[2026-01-01T00:00:00.000Z] [INFO] Batch committed {"batch":3,"found":1}',
    );
    expect(logger.formatLine("warn", "No meta", {}, now)).toBe(
      "[2026-01-01T00:00:00.000Z] [WARN] No meta",
    );
  });

  it("should serialise errors in meta", () => {
    const now = new Date("2026-01-01T00:00:00.000Z");

    expect(logger.formatLine("error", "Failed", { cause: new TypeError("fetch failed") }, now)).toBe(
      '[2026-01-01T00:00:00.000Z] [ERROR] Failed {"cause":{"name":"TypeError","message":"fetch failed"}}',
    );
  });

  it("should merge bound context into every call", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.withContext({ store: "data/results.csv" }).error("Commit failed", { batch: 2 });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(
      / \[ERROR\] Commit failed \{"store":"data\/results\.csv","batch":2\}$/,
    );
  });
});
