import { existsSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { _resetFileLoggingState, createLogger, parseLogLevel, stripAnsi } from "./logger.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("createLogger", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.HALYARD_LOG_LEVEL;
    delete process.env.HALYARD_LOG_FILE;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    _resetFileLoggingState();
  });

  it("should use defaults when no options provided", () => {
    const logger = createLogger();

    expect(logger.settings.minLevel).toBe(4);
    expect(logger.settings.name).toBe("halyard");
    expect(logger.settings.type).toBe("pretty");
  });

  it("should respect explicit options", () => {
    const logger = createLogger({ minLevel: 2, type: "json", name: "halyard:test" });

    expect(logger.settings.minLevel).toBe(2);
    expect(logger.settings.type).toBe("json");
    expect(logger.settings.name).toBe("halyard:test");
  });

  it("should read the level from HALYARD_LOG_LEVEL", () => {
    process.env.HALYARD_LOG_LEVEL = "debug";

    expect(createLogger().settings.minLevel).toBe(2);
  });

  it("should prefer the minLevel option over the environment", () => {
    process.env.HALYARD_LOG_LEVEL = "debug";

    expect(createLogger({ minLevel: 5 }).settings.minLevel).toBe(5);
  });

  it("should write ANSI-free lines to HALYARD_LOG_FILE", async () => {
    const logFile = join(tmpdir(), `halyard-logger-${process.pid}-${Date.now()}.log`);
    process.env.HALYARD_LOG_FILE = logFile;

    const logger = createLogger({ name: "file-test", minLevel: 3 });
    logger.info("hello \x1b[31mred\x1b[0m");
    await sleep(50);

    expect(existsSync(logFile)).toBe(true);
    const content = readFileSync(logFile, "utf-8");
    expect(content).toContain("[file-test]");
    expect(content).toContain("hello red");
    rmSync(logFile, { force: true });
  });
});

describe("parseLogLevel", () => {
  it("should map names and clamp numbers", () => {
    expect(parseLogLevel("WARN")).toBe(4);
    expect(parseLogLevel("9")).toBe(6);
    expect(parseLogLevel(" ")).toBeUndefined();
    expect(parseLogLevel("verbose")).toBeUndefined();
  });
});

describe("stripAnsi", () => {
  it("should remove color codes", () => {
    expect(stripAnsi("\x1b[32mok\x1b[0m")).toBe("ok");
  });
});

describe("logger module", () => {
  it("creates loggers only on request", async () => {
    const logging = await import("./logger.js");

    expect(Object.keys(logging).sort()).toEqual([
      "_resetFileLoggingState",
      "createLogger",
      "parseLogLevel",
      "stripAnsi",
    ]);
  });
});
