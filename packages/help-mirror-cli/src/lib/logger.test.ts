import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { createLogger, createNoopLogger, type LogLevel } from "./logger.js";

const FIXED_TIME = new Date("2024-05-01T12:00:00.000Z");

function captureLogger(level: LogLevel, json: boolean) {
  const lines: string[] = [];
  const logger = createLogger({ level, json, sink: (line) => lines.push(line), now: () => FIXED_TIME });
  return { logger, lines };
}

describe("logger", () => {
  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("logs debug when level is debug", () => {
        const { logger, lines } = captureLogger("debug", false);
        logger.debug("test message");
        expect(lines).toHaveLength(1);
      });

      it("does not log debug when level is info", () => {
        const { logger, lines } = captureLogger("info", false);
        logger.debug("test message");
        expect(lines).toHaveLength(0);
      });

      it("does not log info or warn when level is error", () => {
        const { logger, lines } = captureLogger("error", false);
        logger.info("info");
        logger.warn("warn");
        logger.error("error");
        expect(lines).toHaveLength(1);
        expect(lines[0]).toContain("error");
      });
    });

    describe("human format", () => {
      it("prefixes timestamp and padded level", () => {
        const { logger, lines } = captureLogger("info", false);
        logger.warn("Excluding catalog entry");
        expect(lines[0]).toBe("[2024-05-01T12:00:00.000Z] WARN  Excluding catalog entry");
      });

      it("appends metadata as JSON", () => {
        const { logger, lines } = captureLogger("info", false);
        logger.info("Saved", { id: "a", bytes: 3 });
        expect(lines[0]).toBe('[2024-05-01T12:00:00.000Z] INFO  Saved {"id":"a","bytes":3}');
      });
    });

    describe("JSON format", () => {
      it("emits one JSON object per line", () => {
        const { logger, lines } = captureLogger("info", true);
        logger.error("Write failed", { path: "out/a.html" });
        expect(JSON.parse(lines[0])).toEqual({
          timestamp: "2024-05-01T12:00:00.000Z",
          level: "error",
          message: "Write failed",
          path: "out/a.html",
        });
      });
    });

    describe("default sink", () => {
      let consoleLogSpy: MockInstance;
      let consoleErrorSpy: MockInstance;

      beforeEach(() => {
        consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
        consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      });

      it("writes every level to stderr, never stdout", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.debug("d");
        logger.info("i");
        logger.warn("w");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(3);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("child logger", () => {
      it("includes default meta on all logs", () => {
        const { logger, lines } = captureLogger("debug", true);
        const child = logger.child({ id: "guide-basics" });

        child.info("message 1");
        child.warn("message 2");

        expect(JSON.parse(lines[0]).id).toBe("guide-basics");
        expect(JSON.parse(lines[1]).id).toBe("guide-basics");
      });

      it("per-call metadata overrides default meta", () => {
        const { logger, lines } = captureLogger("debug", true);
        logger.child({ id: "default" }).info("message", { id: "override" });
        expect(JSON.parse(lines[0]).id).toBe("override");
      });

      it("supports nested child loggers", () => {
        const { logger, lines } = captureLogger("debug", true);
        logger.child({ run: 1 }).child({ id: "a" }).info("nested");

        const parsed = JSON.parse(lines[0]);
        expect(parsed.run).toBe(1);
        expect(parsed.id).toBe("a");
      });
    });
  });

  describe("createNoopLogger", () => {
    it("returns a logger that does nothing", () => {
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createNoopLogger();

      logger.info("info");
      logger.child({ id: "x" }).error("error");

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
