import { describe, it, expect } from "vitest";
import { loadIngestionConfig } from "../src/config/IngestionConfig";
import { CorpusValidationError, ErrorCode } from "../src/errors";

describe("loadIngestionConfig", () => {
  it("should fall back to defaults on an empty environment", () => {
    const config = loadIngestionConfig({});

    expect(config).toEqual({
      apiBaseUrl: "https://api.quran.com/api/v4",
      audioBaseUrl: "https://verses.quran.foundation/",
      reciterId: 7,
      dbPath: undefined,
      timeoutMs: 30_000,
      userAgent: "mushaf-store/0.1 (+https://api.quran.com)",
      retry: {
        maxAttempts: 6,
        initialDelayMs: 500,
        maxDelayMs: 30_000,
        backoffMultiplier: 2,
        jitterRatio: 0.25,
      },
      concurrency: 1,
      mode: "fill-missing",
      progressEvery: 250,
      shape: { juzCount: 30, hezbsPerJuz: 2, pageCount: 604 },
    });
  });

  it("should read overrides from the environment", () => {
    const config = loadIngestionConfig({
      MUSHAF_API_BASE_URL: "http://localhost:8080/api/v4",
      MUSHAF_DB_PATH: " ./data/mushaf ",
      MUSHAF_MAX_ATTEMPTS: "4",
      MUSHAF_RETRY_BASE_MS: "100",
      MUSHAF_RETRY_MAX_MS: "2000",
      MUSHAF_CONCURRENCY: "8",
      MUSHAF_MODE: "force-refresh",
      MUSHAF_HEZBS_PER_JUZ: "4",
    });

    expect(config.apiBaseUrl).toBe("http://localhost:8080/api/v4");
    expect(config.dbPath).toBe("./data/mushaf");
    expect(config.retry.maxAttempts).toBe(4);
    expect(config.retry.initialDelayMs).toBe(100);
    expect(config.retry.maxDelayMs).toBe(2000);
    expect(config.concurrency).toBe(8);
    expect(config.mode).toBe("force-refresh");
    expect(config.shape.hezbsPerJuz).toBe(4);
  });

  it("should reject non-numeric values", () => {
    expect(() => loadIngestionConfig({ MUSHAF_MAX_ATTEMPTS: "many" })).toThrow(CorpusValidationError);
  });

  it("should reject out-of-range concurrency", () => {
    expect(() => loadIngestionConfig({ MUSHAF_CONCURRENCY: "0" })).toThrow(
      'Invalid configuration MUSHAF_CONCURRENCY="0": expected an integer in [1, 32]'
    );
  });

  it("should reject a retry cap below the base delay", () => {
    expect(() => loadIngestionConfig({ MUSHAF_RETRY_BASE_MS: "5000", MUSHAF_RETRY_MAX_MS: "1000" })).toThrow(
      "MUSHAF_RETRY_MAX_MS"
    );
  });

  it("should reject non-http URLs and unknown modes", () => {
    const urlError = (() => {
      try {
        loadIngestionConfig({ MUSHAF_API_BASE_URL: "ftp://example.test" });
      } catch (err) {
        return err;
      }
      return undefined;
    })();
    expect(urlError).toBeInstanceOf(CorpusValidationError);
    if (urlError instanceof CorpusValidationError) {
      expect(urlError.code).toBe(ErrorCode.VALIDATION_INVALID_CONFIG);
      expect(urlError.field).toBe("MUSHAF_API_BASE_URL");
    }

    expect(() => loadIngestionConfig({ MUSHAF_MODE: "sometimes" })).toThrow(CorpusValidationError);
  });
});
