import { RETRY_DEFAULTS } from "../config/constants";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Random extra delay of up to this fraction of the computed backoff */
  jitterRatio: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: RETRY_DEFAULTS.MAX_ATTEMPTS,
  initialDelayMs: RETRY_DEFAULTS.INITIAL_DELAY_MS,
  maxDelayMs: RETRY_DEFAULTS.MAX_DELAY_MS,
  backoffMultiplier: RETRY_DEFAULTS.BACKOFF_MULTIPLIER,
  jitterRatio: RETRY_DEFAULTS.JITTER_RATIO,
};

/**
 * Delay before the retry that follows `attempt` (1-based).
 * Exponential growth capped at maxDelayMs, then jitter on top of the capped value.
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponential = config.initialDelayMs * Math.pow(config.backoffMultiplier, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, config.maxDelayMs);
  const jitter = capped * config.jitterRatio * random();
  return Math.round(capped + jitter);
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date.
 * Returns milliseconds to wait, or null when the header is absent or unparseable.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error("Aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error("Aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
