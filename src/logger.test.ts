import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, formatLogLine, isLogLevel, setDefaultLogLevel } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
  setDefaultLogLevel("info");
});

describe("formatLogLine", () => {
  const now = new Date("2026-01-15T12:00:00.000Z");

  it("prints timestamp, level, scope and message", () => {
    expect(formatLogLine("info", "db", "Opened", undefined, now)).toBe(
      "2026-01-15T12:00:00.000Z INFO [db] Opened",
    );
  });

  it("appends metadata as JSON", () => {
    expect(formatLogLine("warn", "auth", "Rejected", { status: 401 }, now)).toBe(
      '2026-01-15T12:00:00.000Z WARN [auth] Rejected {"status":401}',
    );
  });

  it("omits empty metadata", () => {
    expect(formatLogLine("error", "x", "boom", {}, now)).toBe("2026-01-15T12:00:00.000Z ERROR [x] boom");
  });
});

describe("createLogger", () => {
  it("writes info to stdout and warnings to stderr", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("test", "debug");

    log.info("hello");
    log.warn("careful");

    expect(out).toHaveBeenCalledTimes(1);
    expect(out.mock.calls[0]?.[0]).toMatch(/ INFO \[test\] hello$/);
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0]?.[0]).toMatch(/ WARN \[test\] careful$/);
  });

  it("drops messages below its level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = createLogger("test", "warn");

    log.debug("noise");
    log.info("noise");
    log.error("kept");

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
  });

  it("follows the default level when none is given", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const log = createLogger("test");

    setDefaultLogLevel("silent");
    log.info("hidden");
    setDefaultLogLevel("debug");
    log.debug("shown");

    expect(out).toHaveBeenCalledTimes(1);
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
