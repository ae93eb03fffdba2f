import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  type LogLevel,
  getLogLevel,
  log,
  logDebug,
  logError,
  logInfo,
  logWarn,
  setLogLevel,
} from "../logging.js";

describe("Logging Utility", () => {
  const consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

  const firstLine = (): string => String(consoleErrorSpy.mock.calls[0]?.[0]);

  beforeEach(() => {
    consoleErrorSpy.mockClear();
    setLogLevel("info");
  });

  afterEach(() => {
    setLogLevel("info");
  });

  afterAll(() => {
    consoleErrorSpy.mockRestore();
  });

  describe("log function", () => {
    it("should write level, message and timestamp to stderr", () => {
      log("info", "Session opened");

      expect(consoleErrorSpy).toHaveBeenCalledOnce();
      expect(firstLine()).toContain("[INFO] Session opened");
      expect(firstLine()).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /);
    });

    it("should include metadata when provided", () => {
      const metadata = { sessionId: "abc", activeSessions: 2 };
      log("warn", "Slow fetch", metadata);

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("[WARN] Slow fetch"), metadata);
    });

    it("should omit an empty metadata object", () => {
      log("error", "Backend failed", {});

      expect(consoleErrorSpy.mock.calls[0]).toHaveLength(1);
    });
  });

  describe("threshold", () => {
    it("should drop debug lines at the default info threshold", () => {
      logDebug("hidden");

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it("should emit debug lines once the threshold is lowered", () => {
      setLogLevel("debug");
      logDebug("visible");

      expect(getLogLevel()).toBe("debug");
      expect(firstLine()).toContain("[DEBUG] visible");
    });

    it("should drop info and warn lines at the error threshold", () => {
      setLogLevel("error");
      logInfo("info line");
      logWarn("warn line");
      logError("error line");

      expect(consoleErrorSpy).toHaveBeenCalledOnce();
      expect(firstLine()).toContain("[ERROR] error line");
    });
  });

  describe("convenience functions", () => {
    it.each<[LogLevel, (msg: string) => void]>([
      ["info", logInfo],
      ["warn", logWarn],
      ["error", logError],
    ])("should route %s through log", (level, fn) => {
      fn(`${level} message`);

      expect(firstLine()).toContain(`[${level.toUpperCase()}] ${level} message`);
    });
  });
});
