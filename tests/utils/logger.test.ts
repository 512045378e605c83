import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  initLogLevelFromEnv,
  isLogLevel,
  logger,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe("setLogLevel / getLogLevel", () => {
    test("supports all log levels", () => {
      const levels = ["debug", "info", "warn", "error"] as const;
      for (const level of levels) {
        setLogLevel(level);
        expect(getLogLevel()).toBe(level);
      }
    });

    test("logger object exposes the same level controls", () => {
      logger.setLevel("warn");
      expect(logger.getLevel()).toBe("warn");
    });
  });

  describe("log level filtering", () => {
    test("debug logs only at debug level", () => {
      setLogLevel("info");
      debug("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();

      setLogLevel("debug");
      debug("test message");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("info does not log when level is warn", () => {
      setLogLevel("warn");
      info("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("warn and error write to stderr", () => {
      setLogLevel("warn");
      warn("careful");
      error("broken");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("error still logs at error level", () => {
      setLogLevel("error");
      warn("careful");
      error("broken");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("formatMessage", () => {
    test("includes the level and message", () => {
      const line = formatMessage("info", "Uploading archive");

      expect(line).toContain("INFO");
      expect(line.endsWith(" Uploading archive")).toBe(true);
    });

    test("appends serialized data", () => {
      expect(formatMessage("debug", "state", { lastRun: 5 }).endsWith(' state {"lastRun":5}')).toBe(
        true,
      );
      expect(formatMessage("debug", "count", 3).endsWith(" count 3")).toBe(true);
    });

    test("appends an error's message", () => {
      const line = formatMessage("warn", "Failed to send alert:", new Error("fetch failed"));

      expect(line.endsWith(" Failed to send alert: fetch failed")).toBe(true);
    });
  });

  describe("initLogLevelFromEnv", () => {
    test("applies a known LOG_LEVEL", () => {
      setLogLevel("info");
      initLogLevelFromEnv({ LOG_LEVEL: " DEBUG " });
      expect(getLogLevel()).toBe("debug");
    });

    test("ignores unknown or missing values", () => {
      setLogLevel("warn");
      initLogLevelFromEnv({ LOG_LEVEL: "verbose" });
      initLogLevelFromEnv({});
      expect(getLogLevel()).toBe("warn");
    });

    test("isLogLevel recognizes level names", () => {
      expect(isLogLevel("error")).toBe(true);
      expect(isLogLevel("trace")).toBe(false);
    });
  });
});
