import { HTTP_DEFAULTS } from "../config/constants";
import { CorpusNetworkError, type CorpusError } from "../errors";
import { logger } from "../utils/logger";
import {
  DEFAULT_RETRY_CONFIG,
  computeBackoffDelay,
  parseRetryAfter,
  sleep as defaultSleep,
  type RetryConfig,
} from "../utils/retry";

export type FetchFailureKind = "RateLimited" | "ServerError" | "Transport" | "Permanent";

export interface FetchFailure {
  kind: FetchFailureKind;
  attempts: number;
  /** Network error from the client, or the validation error of a rejected payload */
  lastError: CorpusError;
  status?: number;
  url: string;
}

export interface HttpRequest {
  url: string;
  method?: "GET" | "HEAD";
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Cancels the in-flight request and any pending backoff */
  signal?: AbortSignal;
}

export type FetchOutcome =
  | { ok: true; status: number; body: Uint8Array; attempts: number }
  | { ok: false; failure: FetchFailure };

export interface RetryClientStats {
  requests: number;
  attempts: number;
  retries: number;
  rateLimited: number;
  failures: number;
}

export interface RetryClientOptions {
  retry?: Partial<RetryConfig>;
  timeoutMs?: number;
  userAgent?: string;
  /** Resolved on every attempt so a stubbed global fetch is honoured */
  fetchImpl?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

type AttemptResult =
  | { ok: true; status: number; body: Uint8Array }
  | {
      ok: false;
      kind: FetchFailureKind;
      error: CorpusNetworkError;
      status?: number;
      retryAfterMs?: number;
    };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * RetryClient
 * - Single HTTP entry point for the pipeline; one instance per run.
 * - Retries 429, 5xx and transport failures with capped exponential backoff plus jitter.
 * - Honours Retry-After. Other 4xx responses fail immediately.
 * - Never throws: callers receive the response body or a terminal FetchFailure.
 */
/** Error bodies are never read; cancel them so the connection is released. */
async function discardBody(res: Response): Promise<void> {
  try {
    await res.body?.cancel();
  } catch (err) {
    logger.debug("Discarding response body failed", { status: res.status, error: String(err) });
  }
}

export class RetryClient {
  private readonly config: RetryConfig;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly fetchImpl?: typeof fetch;
  private counters: RetryClientStats = {
    requests: 0,
    attempts: 0,
    retries: 0,
    rateLimited: 0,
    failures: 0,
  };

  constructor(options: RetryClientOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.timeoutMs = options.timeoutMs ?? HTTP_DEFAULTS.TIMEOUT_MS;
    this.userAgent = options.userAgent ?? HTTP_DEFAULTS.USER_AGENT;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.fetchImpl = options.fetchImpl;
  }

  stats(): RetryClientStats {
    return { ...this.counters };
  }

  async fetch(request: HttpRequest): Promise<FetchOutcome> {
    this.counters.requests++;
    const log = logger.child({ operation: "RetryClient.fetch", url: request.url });
    const maxAttempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      this.counters.attempts++;
      const result = await this.attemptOnce(request);

      if (result.ok) {
        if (attempt > 1) log.debug("Request succeeded after retry", { attempt });
        return { ok: true, status: result.status, body: result.body, attempts: attempt };
      }

      if (result.kind === "RateLimited") this.counters.rateLimited++;

      if (!result.error.isRetryable || attempt >= maxAttempts) {
        this.counters.failures++;
        log.warn(`Request failed after ${attempt} attempt(s)`, {
          kind: result.kind,
          status: result.status,
          maxAttempts,
        }, result.error);
        return {
          ok: false,
          failure: {
            kind: result.kind,
            attempts: attempt,
            lastError: result.error,
            status: result.status,
            url: request.url,
          },
        };
      }

      const delay = result.retryAfterMs !== undefined
        ? Math.min(result.retryAfterMs, this.config.maxDelayMs)
        : computeBackoffDelay(attempt, this.config, this.random);

      log.debug(`Retrying in ${delay}ms`, { attempt, kind: result.kind, status: result.status });
      this.counters.retries++;

      try {
        await this.sleep(delay, request.signal);
      } catch {
        this.counters.failures++;
        return {
          ok: false,
          failure: {
            kind: "Transport",
            attempts: attempt,
            lastError: CorpusNetworkError.aborted(request.url, { operation: "RetryClient.fetch" }),
            url: request.url,
          },
        };
      }
    }
  }

  private buildHeaders(extra?: Record<string, string>): Headers {
    const h = new Headers(extra ?? {});
    if (!h.has("user-agent")) h.set("user-agent", this.userAgent);
    if (!h.has("accept")) h.set("accept", "application/json");
    return h;
  }

  private async attemptOnce(request: HttpRequest): Promise<AttemptResult> {
    const url = request.url;
    const context = { operation: "RetryClient.fetch", url };
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    if (request.signal?.aborted) {
      return { ok: false, kind: "Transport", error: CorpusNetworkError.aborted(url, context) };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const fetchImpl = this.fetchImpl ?? globalThis.fetch;
      const res = await fetchImpl(url, {
        method: request.method ?? "GET",
        headers: this.buildHeaders(request.headers),
        signal: controller.signal,
        redirect: "follow",
      });

      if (!res.ok) await discardBody(res);

      if (res.status === 429) {
        const retryAfterMs = parseRetryAfter(res.headers.get("retry-after"), this.now()) ?? undefined;
        return {
          ok: false,
          kind: "RateLimited",
          status: 429,
          retryAfterMs,
          error: CorpusNetworkError.rateLimited(url, retryAfterMs, context),
        };
      }

      if (res.status >= 500) {
        const retryAfterMs = parseRetryAfter(res.headers.get("retry-after"), this.now()) ?? undefined;
        return {
          ok: false,
          kind: "ServerError",
          status: res.status,
          retryAfterMs,
          error: CorpusNetworkError.serverError(url, res.status, context),
        };
      }

      if (!res.ok) {
        return {
          ok: false,
          kind: "Permanent",
          status: res.status,
          error: CorpusNetworkError.permanent(url, res.status, context),
        };
      }

      const body = new Uint8Array(await res.arrayBuffer());
      return { ok: true, status: res.status, body };
    } catch (err) {
      if (timedOut) {
        return { ok: false, kind: "Transport", error: CorpusNetworkError.timeout(url, timeoutMs, context) };
      }
      if (request.signal?.aborted) {
        return { ok: false, kind: "Transport", error: CorpusNetworkError.aborted(url, context) };
      }
      return {
        ok: false,
        kind: "Transport",
        error: CorpusNetworkError.connectionFailed(url, toError(err), context),
      };
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
