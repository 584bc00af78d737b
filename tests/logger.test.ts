import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { Logger } from "../tooling/lib/logger";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger("debug", false); // Disable console output for tests
  });

  describe("logging levels", () => {
    it("should log at debug level", () => {
      logger.debug("Debug message", { value: 42 });
      const entries = logger.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe("debug");
      expect(entries[0].message).toBe("Debug message");
    });

    it("should log at warn level", () => {
      logger.warn("Warning message");
      expect(logger.getEntries()[0].level).toBe("warn");
    });

    it("should only log at or above configured level", () => {
      const infoLogger = new Logger("info", false);
      infoLogger.debug("Debug message");
      infoLogger.info("Info message");
      infoLogger.warn("Warn message");

      const entries = infoLogger.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe("info");
      expect(entries[1].level).toBe("warn");
    });
  });

  describe("context management", () => {
    it("should merge pushed context into the current one", () => {
      logger.pushContext({ trial: "sort satisfies its signature" });
      logger.pushContext({ phase: "conformance" });
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({
        trial: "sort satisfies its signature",
        phase: "conformance",
      });
    });

    it("should drop popped keys only", () => {
      logger.pushContext({ trial: "sort", phase: "robustness", component: "generator" });
      logger.popContext(["component"]);
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ trial: "sort", phase: "robustness" });
    });

    it("should leave no context once every key is popped", () => {
      logger.pushContext({ component: "validator", descriptor: "list(integer)" });
      logger.popContext(["component", "descriptor"]);
      logger.info("Message");

      expect(logger.getEntries()[0].context).toBeUndefined();
    });
  });

  describe("console output", () => {
    it("should prefix messages with their context and append data", () => {
      const printing = new Logger("debug", true);
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      try {
        printing.pushContext({ phase: "robustness", component: "invalid-generator", descriptor: "list(integer)" });
        printing.warn("Degraded", { draws: 2 });
        expect(warn).toHaveBeenCalledWith("[robustness] <invalid-generator> (list(integer)): Degraded\n  draws: 2");
      } finally {
        warn.mockRestore();
      }
    });
  });

  describe("timers", () => {
    it("should report the elapsed time when a timer ends", () => {
      logger.startTimer("operation");
      const duration = logger.endTimer("operation", "Operation completed");

      const entries = logger.getEntries();
      expect(duration).toBeGreaterThanOrEqual(0);
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Operation completed");
      expect(entries[0].data?.duration).toBe(duration);
    });

    it("should warn when ending a timer that never started", () => {
      expect(logger.endTimer("missing", "Done")).toBe(0);
      expect(logger.getEntries()[0]).toMatchObject({ level: "warn", message: 'Timer "missing" not found' });
    });
  });

  describe("entry filtering", () => {
    it("should filter entries by level", () => {
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");
      logger.error("Error");

      const warnAndAbove = logger.getEntriesAtLevel("warn");
      expect(warnAndAbove.map((entry) => entry.level)).toEqual(["warn", "error"]);
    });
  });

  describe("summary", () => {
    it("should count entries per level", () => {
      logger.debug("Debug");
      logger.info("Info 1");
      logger.info("Info 2");
      logger.warn("Warn");
      logger.error("Error");

      expect(logger.getSummary()).toEqual({
        totalEntries: 5,
        debugCount: 1,
        infoCount: 2,
        warnCount: 1,
        errorCount: 1,
      });
    });
  });

  it("should clear all entries", () => {
    logger.info("Message 1");
    logger.info("Message 2");
    logger.clear();
    expect(logger.getEntries()).toHaveLength(0);
  });

  it("should change logging level dynamically", () => {
    logger.setLevel("warn");
    logger.debug("Debug");
    logger.info("Info");
    logger.warn("Warn");

    const entries = logger.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe("warn");
  });
});
