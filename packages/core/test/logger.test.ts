import { describe, it, expect, afterEach } from "vitest";
import { createLogger, isLogLevel, levelFromEnv } from "../src/logger.js";

describe("createLogger", () => {
  const capture = () => {
    const lines: string[] = [];
    return { lines, sink: (line: string) => lines.push(line) };
  };

  it("prefixes lines with the scope", () => {
    const { lines, sink } = capture();
    const logger = createLogger("graph", "info", sink);
    logger.info("built 3 units");
    logger.warn("slow");
    expect(lines).toEqual(["[graph] built 3 units", "[graph] warn: slow"]);
  });

  it("drops lines below the level", () => {
    const { lines, sink } = capture();
    const logger = createLogger("graph", "warn", sink);
    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");
    expect(lines).toEqual(["[graph] error: shown"]);
  });

  it("appends the cause of errors", () => {
    const { lines, sink } = capture();
    createLogger("cli", "debug", sink).error("read failed", new Error("ENOENT"));
    expect(lines).toEqual(["[cli] error: read failed: ENOENT"]);
  });

  it("child loggers extend the scope", () => {
    const { lines, sink } = capture();
    createLogger("deadwood", "info", sink).child("run").info("start");
    expect(lines).toEqual(["[deadwood:run] start"]);
  });

  it("silent swallows everything", () => {
    const { lines, sink } = capture();
    const logger = createLogger("x", "silent", sink);
    logger.error("nothing");
    expect(lines).toEqual([]);
  });
});

describe("levelFromEnv", () => {
  afterEach(() => {
    delete process.env.DEADWOOD_LOG_LEVEL;
  });

  it("reads DEADWOOD_LOG_LEVEL", () => {
    process.env.DEADWOOD_LOG_LEVEL = "DEBUG";
    expect(levelFromEnv()).toBe("debug");
  });

  it("ignores unknown levels", () => {
    process.env.DEADWOOD_LOG_LEVEL = "loud";
    expect(levelFromEnv("warn")).toBe("warn");
  });

  it("recognizes level names", () => {
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
