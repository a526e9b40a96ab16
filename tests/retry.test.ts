import { describe, it, expect } from "vitest";
import { computeBackoffDelay, parseRetryAfter, sleep, DEFAULT_RETRY_CONFIG, type RetryConfig } from "../src/utils/retry";

const config: RetryConfig = {
  maxAttempts: 6,
  initialDelayMs: 500,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterRatio: 0.25,
};

describe("computeBackoffDelay", () => {
  it("should grow exponentially without jitter", () => {
    const noJitter = () => 0;
    expect(computeBackoffDelay(1, config, noJitter)).toBe(500);
    expect(computeBackoffDelay(2, config, noJitter)).toBe(1000);
    expect(computeBackoffDelay(4, config, noJitter)).toBe(4000);
  });

  it("should cap the delay at maxDelayMs", () => {
    expect(computeBackoffDelay(10, config, () => 0)).toBe(30_000);
  });

  it("should add at most jitterRatio of the capped delay", () => {
    expect(computeBackoffDelay(1, config, () => 1)).toBe(625);
    expect(computeBackoffDelay(10, config, () => 0.5)).toBe(33_750);
  });

  it("should use documented defaults", () => {
    expect(DEFAULT_RETRY_CONFIG).toEqual(config);
  });
});

describe("parseRetryAfter", () => {
  it("should parse delta seconds", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter(" 1.5 ")).toBe(1500);
  });

  it("should parse an HTTP date relative to now", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:05 GMT", now)).toBe(5000);
  });

  it("should clamp past dates to zero", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:27:00 GMT", now)).toBe(0);
  });

  it("should return null for missing or garbage values", () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter("")).toBeNull();
    expect(parseRetryAfter("soon")).toBeNull();
  });
});

describe("sleep", () => {
  it("should resolve after the delay", async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it("should reject when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });

  it("should reject immediately on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("already"));
    await expect(sleep(10, controller.signal)).rejects.toThrow("already");
  });
});
