import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createFileLogger, formatLogDate, formatLogTimestamp, getLogFilePath } from "../../src/utils/logger.js";

const FIXED_DATE = new Date(2026, 2, 5, 9, 30, 0);

describe("createFileLogger", () => {
  let baseDir = "";

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "promptcache-logger-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (baseDir) {
      await rm(baseDir, { recursive: true, force: true });
      baseDir = "";
    }
  });

  it("names the log file after the local calendar date", () => {
    expect(formatLogDate(FIXED_DATE)).toBe("20260305");
    expect(getLogFilePath("logs", FIXED_DATE)).toBe(join("logs", "llm_calls_20260305.log"));
  });

  it("stamps lines in local time so they agree with the file date", () => {
    const lateNight = new Date(2026, 9, 18, 23, 59, 59, 5);
    const logger = createFileLogger({ logDir: baseDir, now: () => lateNight });

    logger.info("PROMPT: late");

    expect(formatLogTimestamp(lateNight)).toBe("2026-10-18 23:59:59,005");
    expect(readFileSync(join(baseDir, "llm_calls_20261018.log"), "utf8")).toBe(
      "2026-10-18 23:59:59,005 - INFO - PROMPT: late\n"
    );
  });

  it("appends timestamped lines and creates the log directory", () => {
    const logDir = join(baseDir, "nested", "logs");
    const logger = createFileLogger({ logDir, now: () => FIXED_DATE });

    logger.info("PROMPT: hello");
    logger.warn("cache looks odd");
    logger.error("LLM call failed: boom");

    const lines = readFileSync(join(logDir, "llm_calls_20260305.log"), "utf8").split("\n");
    const stamp = "2026-03-05 09:30:00,000";
    expect(lines).toEqual([
      `${stamp} - INFO - PROMPT: hello`,
      `${stamp} - WARNING - cache looks odd`,
      `${stamp} - ERROR - LLM call failed: boom`,
      "",
    ]);
  });

  it("drops debug lines unless debug is enabled", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createFileLogger({ logDir: baseDir, now: () => FIXED_DATE });

    logger.debug("hidden");

    expect(existsSync(join(baseDir, "llm_calls_20260305.log"))).toBe(false);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("echoes to stderr when debug is enabled", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createFileLogger({ logDir: baseDir, debug: true, now: () => FIXED_DATE });

    logger.info("quiet");
    logger.warn("careful");
    logger.debug("details");

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[0]?.[0]).toContain("[WARN] careful");
    expect(errorSpy.mock.calls[1]?.[0]).toContain("[DEBUG] details");

    const content = readFileSync(join(baseDir, "llm_calls_20260305.log"), "utf8");
    expect(content).toContain(" - DEBUG - details\n");
  });

  it("reports an unwritable log directory once instead of throwing", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createFileLogger({ logDir: baseDir, now: () => FIXED_DATE }).info("make file");
    const filePath = join(baseDir, "llm_calls_20260305.log");
    const logger = createFileLogger({ logDir: join(filePath, "sub"), now: () => FIXED_DATE });

    expect(() => logger.info("first")).not.toThrow();
    expect(() => logger.info("second")).not.toThrow();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
