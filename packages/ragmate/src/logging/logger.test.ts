import { existsSync, readFileSync } from "node:fs";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { _resetFileLoggingState, createLogger, parseLogLevel, stripAnsi } from "./logger.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("parseLogLevel", () => {
  it("accepts names case-insensitively and numbers clamped to 0-6", () => {
    expect(parseLogLevel("debug")).toBe(2);
    expect(parseLogLevel("WARN")).toBe(4);
    expect(parseLogLevel("3")).toBe(3);
    expect(parseLogLevel("10")).toBe(6);
    expect(parseLogLevel("-1")).toBe(0);
  });

  it("returns undefined for blank or unknown values", () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel("   ")).toBeUndefined();
    expect(parseLogLevel("loud")).toBeUndefined();
  });
});

describe("createLogger", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.RAGMATE_LOG_LEVEL;
    delete process.env.RAGMATE_LOG_FILE;
    delete process.env.RAGMATE_LOG_RESET;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("defaults to warn, pretty output and the ragmate name", () => {
    const logger = createLogger();

    expect(logger.settings.minLevel).toBe(4);
    expect(logger.settings.type).toBe("pretty");
    expect(logger.settings.name).toBe("ragmate");
  });

  it("reads RAGMATE_LOG_LEVEL", () => {
    process.env.RAGMATE_LOG_LEVEL = "debug";

    expect(createLogger().settings.minLevel).toBe(2);
  });

  it("prefers the option over the environment", () => {
    process.env.RAGMATE_LOG_LEVEL = "2";

    expect(createLogger({ minLevel: 5 }).settings.minLevel).toBe(5);
  });

  it("hides log positions outside pretty output", () => {
    expect(createLogger({ type: "json" }).settings.hideLogPositionForProduction).toBe(true);
    expect(createLogger({ type: "pretty" }).settings.hideLogPositionForProduction).toBe(false);
  });

  it("does not throw when hidden", () => {
    const logger = createLogger({ type: "hidden" });

    expect(() => logger.info("message", { data: 1 })).not.toThrow();
  });
});

describe("file logging", () => {
  const originalEnv = { ...process.env };
  let logFile: string;

  beforeEach(() => {
    logFile = join(tmpdir(), `ragmate-log-${Date.now()}-${Math.random().toString(36).slice(2)}.log`);
    _resetFileLoggingState();
    delete process.env.RAGMATE_LOG_LEVEL;
    delete process.env.RAGMATE_LOG_RESET;
  });

  afterEach(async () => {
    _resetFileLoggingState();
    process.env = { ...originalEnv };
    await sleep(50);
    await rm(logFile, { force: true });
  });

  it("writes ANSI-free lines with level and name", async () => {
    process.env.RAGMATE_LOG_FILE = logFile;
    process.env.RAGMATE_LOG_LEVEL = "0";
    const logger = createLogger({ name: "agent" });

    logger.info("hello world");
    await sleep(50);

    const content = readFileSync(logFile, "utf-8");
    expect(content).toContain("hello world");
    expect(content).toContain("[agent]");
    expect(content).toContain("INFO");
    expect(content).toBe(stripAnsi(content));
  });

  it("truncates the file when RAGMATE_LOG_RESET is set", async () => {
    process.env.RAGMATE_LOG_FILE = logFile;
    process.env.RAGMATE_LOG_LEVEL = "0";
    createLogger({ name: "first" }).info("first message");
    await sleep(50);

    _resetFileLoggingState();
    process.env.RAGMATE_LOG_RESET = "true";
    createLogger({ name: "second" }).info("second message");
    await sleep(50);

    const content = readFileSync(logFile, "utf-8");
    expect(content).toContain("second message");
    expect(content).not.toContain("first message");
  });

  it("creates no file when RAGMATE_LOG_FILE is unset", () => {
    delete process.env.RAGMATE_LOG_FILE;
    createLogger({ name: "quiet", type: "hidden" }).warn("nothing on disk");

    expect(existsSync(logFile)).toBe(false);
  });
});

describe("stripAnsi", () => {
  it("removes color codes", () => {
    expect(stripAnsi("\x1b[1m\x1b[32mbold green\x1b[0m normal")).toBe("bold green normal");
    expect(stripAnsi("\x1b[38;5;196mextended\x1b[0m")).toBe("extended");
  });
});
