import { describe, it, expect, vi, afterEach } from "vitest";
import { RetryClient } from "../src/services/RetryClient";
import { ErrorCode } from "../src/errors";
import { jsonResponse, recordingSleep } from "./setup";

const URL_UNDER_TEST = "https://api.test/verses/by_key/1:1";

function mockFetch(impl: () => Response | Promise<Response>) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => impl());
}

function status(code: number, headers: Record<string, string> = {}) {
  return () => new Response("", { status: code, headers });
}

const decode = (body: Uint8Array) => new TextDecoder().decode(body);

describe("RetryClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the body on first success", async () => {
    const fetchImpl = mockFetch(() => jsonResponse({ hello: "world" }));
    const client = new RetryClient({ fetchImpl });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.status).toBe(200);
    expect(outcome.attempts).toBe(1);
    expect(JSON.parse(decode(outcome.body))).toEqual({ hello: "world" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("should stop after maxAttempts on a constant 503", async () => {
    const fetchImpl = mockFetch(status(503));
    const { delays, sleep } = recordingSleep();
    const client = new RetryClient({ fetchImpl, sleep, random: () => 0, retry: { maxAttempts: 4 } });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe("ServerError");
    expect(outcome.failure.attempts).toBe(4);
    expect(outcome.failure.status).toBe(503);
    expect(outcome.failure.url).toBe(URL_UNDER_TEST);
    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([500, 1000, 2000]);
  });

  it("should cancel the bodies of failed responses", async () => {
    let cancelled = 0;
    const fetchImpl = mockFetch(
      () =>
        new Response(
          new ReadableStream<Uint8Array>({
            cancel() {
              cancelled++;
            },
          }),
          { status: 502 }
        )
    );
    const client = new RetryClient({ fetchImpl, sleep: recordingSleep().sleep, retry: { maxAttempts: 3 } });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(false);
    expect(cancelled).toBe(3);
  });

  it("should honour Retry-After on 429 and then succeed", async () => {
    const responses = [status(429, { "retry-after": "2" }), () => jsonResponse({ ok: 1 })];
    const fetchImpl = mockFetch(() => {
      const next = responses.shift();
      if (!next) throw new Error("unexpected call");
      return next();
    });
    const { delays, sleep } = recordingSleep();
    const client = new RetryClient({ fetchImpl, sleep });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.attempts).toBe(2);
    expect(delays).toEqual([2000]);
    expect(client.stats()).toEqual({ requests: 1, attempts: 2, retries: 1, rateLimited: 1, failures: 0 });
  });

  it("should clamp Retry-After to maxDelayMs", async () => {
    const fetchImpl = mockFetch(status(429, { "retry-after": "120" }));
    const { delays, sleep } = recordingSleep();
    const client = new RetryClient({ fetchImpl, sleep, retry: { maxAttempts: 2, maxDelayMs: 1000 } });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe("RateLimited");
    expect(delays).toEqual([1000]);
  });

  it("should not retry a 404", async () => {
    const fetchImpl = mockFetch(status(404));
    const { delays, sleep } = recordingSleep();
    const client = new RetryClient({ fetchImpl, sleep });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe("Permanent");
    expect(outcome.failure.attempts).toBe(1);
    expect(outcome.failure.status).toBe(404);
    expect(outcome.failure.lastError.code).toBe(ErrorCode.HTTP_PERMANENT);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("should retry transport errors as Transport", async () => {
    const fetchImpl = mockFetch(() => {
      throw new TypeError("fetch failed");
    });
    const { sleep } = recordingSleep();
    const client = new RetryClient({ fetchImpl, sleep, retry: { maxAttempts: 3 } });

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe("Transport");
    expect(outcome.failure.attempts).toBe(3);
    expect(outcome.failure.lastError.code).toBe(ErrorCode.NETWORK_CONNECTION_FAILED);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(client.stats().failures).toBe(1);
  });

  it("should end with an aborted Transport failure when cancelled during backoff", async () => {
    const controller = new AbortController();
    const fetchImpl = mockFetch(() => {
      controller.abort();
      return new Response("", { status: 503 });
    });
    const { sleep } = recordingSleep();
    const client = new RetryClient({ fetchImpl, sleep });

    const outcome = await client.fetch({ url: URL_UNDER_TEST, signal: controller.signal });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe("Transport");
    expect(outcome.failure.attempts).toBe(1);
    expect(outcome.failure.lastError.code).toBe(ErrorCode.NETWORK_ABORTED);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("should not call fetch when the signal is already aborted", async () => {
    const fetchImpl = mockFetch(() => jsonResponse({}));
    const controller = new AbortController();
    controller.abort();
    const client = new RetryClient({ fetchImpl });

    const outcome = await client.fetch({ url: URL_UNDER_TEST, signal: controller.signal });

    expect(outcome.ok).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("should send user-agent and accept headers", async () => {
    const fetchImpl = mockFetch(() => jsonResponse({}));
    const client = new RetryClient({ fetchImpl, userAgent: "mushaf-test/1.0" });

    await client.fetch({ url: URL_UNDER_TEST });

    const init = fetchImpl.mock.calls[0]?.[1];
    const headers = new Headers(init?.headers);
    expect(headers.get("user-agent")).toBe("mushaf-test/1.0");
    expect(headers.get("accept")).toBe("application/json");
  });

  it("should use the global fetch when none is injected", async () => {
    const globalFetch = mockFetch(() => jsonResponse({ stubbed: true }));
    vi.stubGlobal("fetch", globalFetch);
    const client = new RetryClient();

    const outcome = await client.fetch({ url: URL_UNDER_TEST });

    expect(outcome.ok).toBe(true);
    expect(globalFetch).toHaveBeenCalledTimes(1);
  });
});
