import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  Logger,
  LogLevel,
  LogLevelNames,
  createLogger,
  parseLogLevel,
  type LogEntry,
} from "../src/logger.ts";

let consoleOutput: string[] = [];
let errorOutput: string[] = [];

function parseEntry(line: string | undefined): LogEntry {
  expect(line).toBeDefined();
  return JSON.parse(line ?? "{}");
}

describe("Logger", () => {
  beforeEach(() => {
    consoleOutput = [];
    errorOutput = [];

    vi.spyOn(console, "log").mockImplementation((message: string) => {
      consoleOutput.push(message);
    });
    vi.spyOn(console, "error").mockImplementation((message: string) => {
      errorOutput.push(message);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("LogLevel", () => {
    it("should order levels from TRACE to FATAL", () => {
      expect(LogLevel.TRACE).toBe(0);
      expect(LogLevel.INFO).toBe(2);
      expect(LogLevel.FATAL).toBe(5);
      expect(LogLevelNames[LogLevel.WARN]).toBe("WARN");
    });

    it("should parse level names case-insensitively", () => {
      expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
      expect(parseLogLevel("TRACE")).toBe(LogLevel.TRACE);
      expect(parseLogLevel("error")).toBe(LogLevel.ERROR);
    });

    it("should fall back to INFO for unknown or missing levels", () => {
      expect(parseLogLevel("loud")).toBe(LogLevel.INFO);
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    });
  });

  describe("filtering", () => {
    it("should drop messages below the configured level", () => {
      const testLogger = new Logger({ level: LogLevel.WARN, outputFormat: "json" });

      testLogger.info("hidden");
      testLogger.warn("shown");

      expect(consoleOutput).toHaveLength(1);
      expect(parseEntry(consoleOutput[0]).message).toBe("shown");
    });

    it("should lower the level to DEBUG in verbose mode", () => {
      const testLogger = new Logger({ verbose: true, outputFormat: "json" });

      testLogger.debug("debug message");

      expect(parseEntry(consoleOutput[0]).level).toBe("DEBUG");
    });

    it("should let quiet mode override verbose", () => {
      const testLogger = new Logger({ verbose: true, quiet: true });

      testLogger.info("hidden");
      testLogger.debug("hidden too");

      expect(consoleOutput).toHaveLength(0);
      expect(testLogger.getState().verbose).toBe(false);
      expect(testLogger.getState().level).toBe(LogLevel.WARN);
    });

    it("should print nothing when silent", () => {
      const testLogger = new Logger({ silent: true });

      testLogger.error("nothing");
      testLogger.fatal("nothing");

      expect(consoleOutput).toHaveLength(0);
      expect(errorOutput).toHaveLength(0);
    });
  });

  describe("output", () => {
    it("should send errors and fatals to stderr", () => {
      const testLogger = new Logger({ outputFormat: "json" });

      testLogger.warn("a warning");
      testLogger.error("an error");
      testLogger.fatal("a fatal");

      expect(consoleOutput).toHaveLength(1);
      expect(errorOutput).toHaveLength(2);
      expect(parseEntry(errorOutput[1]).level).toBe("FATAL");
    });

    it("should include component and context in JSON entries", () => {
      const testLogger = new Logger({ outputFormat: "json", component: "Pipeline" });

      testLogger.info("processed", { filePath: "a.html", count: 3 });

      const entry = parseEntry(consoleOutput[0]);
      expect(entry.component).toBe("Pipeline");
      expect(entry.context).toEqual({ filePath: "a.html", count: 3 });
    });

    it("should record error details when logging an Error", () => {
      const testLogger = new Logger({ outputFormat: "json" });

      testLogger.error(new Error("boom"));

      const entry = parseEntry(errorOutput[0]);
      expect(entry.message).toBe("boom");
      expect(entry.error?.name).toBe("Error");
    });

    it("should write human lines with level, component and message", () => {
      const testLogger = new Logger({
        colorize: false,
        timestamp: false,
        component: "CLI",
      });

      testLogger.info("hello");

      expect(consoleOutput[0]).toContain("INFO");
      expect(consoleOutput[0]).toContain("[CLI]");
      expect(consoleOutput[0]).toContain("hello");
    });
  });

  describe("verbose helpers", () => {
    it("should only log file operations in verbose mode", () => {
      const quietLogger = new Logger({ outputFormat: "json" });
      quietLogger.fileOperation("read", "/tmp/a.html");
      expect(consoleOutput).toHaveLength(0);

      const verboseLogger = new Logger({ verbose: true, outputFormat: "json" });
      verboseLogger.fileOperation("write", "/tmp/a.html", { size: 2048 });

      const entry = parseEntry(consoleOutput[0]);
      expect(entry.message).toBe("write: /tmp/a.html (2KB)");
      expect(entry.context).toEqual({ operation: "write", filePath: "/tmp/a.html" });
    });

    it("should prefix process steps with the step name", () => {
      const testLogger = new Logger({ verbose: true, outputFormat: "json" });

      testLogger.processStep("breadcrumb", "1 change(s)");

      expect(parseEntry(consoleOutput[0]).message).toBe("breadcrumb: 1 change(s)");
    });
  });

  describe("surface", () => {
    it("should take its settings only at construction", () => {
      const publicMethods = Object.getOwnPropertyNames(Logger.prototype).filter(
        (name) => name !== "constructor",
      );

      expect(publicMethods.sort()).toEqual([
        "child",
        "createLogEntry",
        "debug",
        "error",
        "fatal",
        "fileOperation",
        "formatHuman",
        "getState",
        "info",
        "log",
        "output",
        "processStep",
        "shouldLog",
        "warn",
      ]);
    });
  });

  describe("child loggers", () => {
    it("should inherit settings and take the new component", () => {
      const parent = new Logger({ level: LogLevel.ERROR, outputFormat: "json" });
      const child = parent.child("DeepL");

      expect(child.getState()).toEqual({
        level: LogLevel.ERROR,
        verbose: false,
        quiet: false,
        silent: false,
        outputFormat: "json",
        component: "DeepL",
      });
    });

    it("should derive component loggers from the silenced default logger", () => {
      const componentLogger = createLogger("Config");

      componentLogger.error("not printed");

      expect(componentLogger.getState().component).toBe("Config");
      expect(errorOutput).toHaveLength(0);
    });
  });
});
