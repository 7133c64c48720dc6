import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import {
  type LogSink,
  currentLogLevel,
  getLogger,
  parseLogLevel,
  resetLogging,
  resolveLogLevel,
  setupLogging
} from "../logger";

describe("logger", () => {
  let lines: string[];
  let sink: LogSink;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    lines = [];
    sink = { write: (line) => lines.push(line) };
  });

  afterEach(() => {
    resetLogging();
  });

  it("defaults to warning", () => {
    expect(currentLogLevel()).toBe("warning");
  });

  it("drops messages below the configured level", () => {
    setupLogging("warning", sink);
    const logger = getLogger("dispatch");

    logger.info("hidden");
    logger.debug("hidden");
    logger.warn("seed missing");
    logger.error("broken");

    expect(lines).toEqual(["WARNING: seed missing", "ERROR: broken"]);
  });

  it("adds timestamp and logger name at debug", () => {
    setupLogging("debug", sink);
    getLogger("executor").debug("step started");
    getLogger("executor").trace("too chatty");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[DEBUG\] executor - step started$/);
  });

  it("keeps the sink when only the level changes", () => {
    setupLogging("info", sink);
    setupLogging("error");
    getLogger("cli").error("still captured");

    expect(lines).toEqual(["ERROR: still captured"]);
  });

  it("reports whether a level is enabled", () => {
    setupLogging("info", sink);
    const logger = getLogger("cli");
    expect(logger.enabled("warning")).toBe(true);
    expect(logger.enabled("info")).toBe(true);
    expect(logger.enabled("debug")).toBe(false);
  });

  describe("parseLogLevel", () => {
    it("accepts known levels in any case", () => {
      expect(parseLogLevel("DEBUG")).toBe("debug");
      expect(parseLogLevel(" trace ")).toBe("trace");
    });

    it("falls back to info", () => {
      expect(parseLogLevel("LOUD")).toBe("info");
      expect(parseLogLevel(undefined)).toBe("info");
    });
  });

  describe("resolveLogLevel", () => {
    it("prefers the flag over everything", () => {
      expect(
        resolveLogLevel({ flag: "error", verbose: true, env: { QF_LOG_LEVEL: "trace" }, configLevel: "info" })
      ).toBe("error");
    });

    it("treats --verbose as debug", () => {
      expect(resolveLogLevel({ verbose: true, env: { QF_LOG_LEVEL: "trace" } })).toBe("debug");
    });

    it("reads the environment before the config", () => {
      expect(resolveLogLevel({ env: { QF_LOG_LEVEL: "trace" }, configLevel: "info" })).toBe("trace");
      expect(resolveLogLevel({ env: {}, configLevel: "info" })).toBe("info");
    });

    it("defaults to warning", () => {
      expect(resolveLogLevel({ env: {} })).toBe("warning");
    });
  });
});
