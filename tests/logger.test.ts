import { describe, it, expect, beforeEach } from "vitest";
import { createLogger, isLogLevel, logger, type LogLevel } from "../src/utils/logger";
import { CorpusNetworkError, ErrorCode } from "../src/errors";

describe("logger", () => {
  let lines: Array<[LogLevel, string]>;

  beforeEach(() => {
    lines = [];
    logger.reset();
    logger.configure({ minLevel: "debug", sink: (level, line) => lines.push([level, line]) });
  });

  it("should write plain lines with prefix, level and context", () => {
    logger.info("Ingestion started", { total: 10, mode: "fill-missing" });

    expect(lines).toEqual([["info", '[mushaf] [INFO] Ingestion started | total=10 mode="fill-missing"']]);
  });

  it("should drop lines below the minimum level", () => {
    logger.configure({ minLevel: "warn" });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("kept");

    expect(lines.map(([level]) => level)).toEqual(["warn"]);
  });

  it("should merge context through nested children", () => {
    createLogger({ component: "VerseFetcher" }).child({ ayatId: 7 }).debug("parsed", { words: 3 });

    expect(lines[0]?.[1]).toBe('[mushaf] [DEBUG] parsed | component="VerseFetcher" ayatId=7 words=3');
  });

  it("should append the error summary in plain mode", () => {
    const error = CorpusNetworkError.serverError("api.test", 503, { operation: "RetryClient.fetch" });

    logger.error("Request failed", undefined, error);

    expect(lines[0]?.[1]).toBe(
      "[mushaf] [ERROR] Request failed | [CorpusNetworkError] | Code: 2004 | Op: RetryClient.fetch | HTTP 503 from api.test"
    );
  });

  it("should emit JSON entries with error codes in structured mode", () => {
    logger.configure({ structuredOutput: true });
    const error = CorpusNetworkError.permanent("api.test", 404, { operation: "RetryClient.fetch" });

    logger.warn("Request failed", { attempts: 1 }, error);

    const entry: unknown = JSON.parse(lines[0]?.[1] ?? "null");
    expect(entry).toMatchObject({
      level: "warn",
      message: "Request failed",
      context: { attempts: 1 },
      error: { name: "CorpusNetworkError", code: ErrorCode.HTTP_PERMANENT, operation: "RetryClient.fetch" },
    });
  });

  it("should recognise level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
