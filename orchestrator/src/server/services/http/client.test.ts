import { describe, expect, it, vi } from "vitest";
import {
  buildUrl,
  computeBackoffDelay,
  type FetchLike,
  HttpClient,
  type HttpClientOptions,
  parseLinkHeader,
  parseRateLimitReset,
  parseRetryAfter,
} from "./client";
import { HttpError } from "./errors";
import { jsonResponse } from "./test-utils";

function createClient(overrides: Partial<HttpClientOptions> = {}) {
  const fetchImpl = vi.fn<FetchLike>();
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new HttpClient({
    name: "test",
    baseUrl: "https://api.example.test/v1",
    fetchImpl,
    sleep,
    random: () => 0,
    now: () => 1_000,
    ...overrides,
  });
  return { client, fetchImpl, sleep };
}

function abortError(): Error {
  const error = new Error("request aborted");
  error.name = "AbortError";
  return error;
}

describe("buildUrl", () => {
  it("joins base and path and encodes query params", () => {
    const url = buildUrl("https://api.example.test/v1/", "/candidates", {
      per_page: 50,
      page: 2,
      skip: undefined,
      empty: null,
      ids: [1, 2],
    });
    const parsed = new URL(url);
    expect(parsed.pathname).toBe("/v1/candidates");
    expect(parsed.searchParams.get("per_page")).toBe("50");
    expect(parsed.searchParams.get("page")).toBe("2");
    expect(parsed.searchParams.has("skip")).toBe(false);
    expect(parsed.searchParams.has("empty")).toBe(false);
    expect(parsed.searchParams.getAll("ids")).toEqual(["1", "2"]);
  });

  it("keeps absolute URLs as they are", () => {
    expect(
      buildUrl("https://api.example.test/v1", "https://other.test/x?page=3"),
    ).toBe("https://other.test/x?page=3");
  });
});

describe("retry helpers", () => {
  it("parses Retry-After seconds and dates", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    const now = Date.parse("2026-10-21T07:28:00Z");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:10 GMT", now)).toBe(10_000);
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:27:00 GMT", now)).toBe(0);
    expect(parseRetryAfter("soon")).toBeNull();
    expect(parseRetryAfter(null)).toBeNull();
  });

  it("parses rate-limit reset as delta seconds or epoch seconds", () => {
    expect(parseRateLimitReset("5", 0)).toBe(5000);
    expect(parseRateLimitReset("1800000010", 1_800_000_000_000)).toBe(10_000);
    expect(parseRateLimitReset("later", 0)).toBeNull();
  });

  it("computes capped exponential backoff with jitter", () => {
    const config = { baseDelayMs: 1000, maxDelayMs: 30_000 };
    expect(computeBackoffDelay(1, config, () => 0)).toBe(500);
    expect(computeBackoffDelay(3, config, () => 1)).toBe(4000);
    expect(computeBackoffDelay(10, config, () => 1)).toBe(30_000);
  });

  it("parses Link headers", () => {
    expect(
      parseLinkHeader(
        '<https://h.test/v1/jobs?page=2>; rel="next", <https://h.test/v1/jobs?page=9>; rel="last"',
      ),
    ).toEqual({
      next: "https://h.test/v1/jobs?page=2",
      last: "https://h.test/v1/jobs?page=9",
    });
    expect(parseLinkHeader(null)).toEqual({});
  });
});

describe("HttpClient", () => {
  it("retries idempotent requests on 5xx and returns parsed JSON", async () => {
    const { client, fetchImpl, sleep } = createClient();
    fetchImpl
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse([{ id: 1 }]));

    await expect(client.get("/jobs")).resolves.toEqual([{ id: 1 }]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it("honours Retry-After on 429 even for POST", async () => {
    const { client, fetchImpl, sleep } = createClient();
    fetchImpl
      .mockResolvedValueOnce(
        new Response("slow down", {
          status: 429,
          headers: { "retry-after": "2" },
        }),
      )
      .mockResolvedValueOnce(jsonResponse({ data: { id: "7" } }, 201));

    await expect(client.post("/candidates", { a: 1 })).resolves.toEqual({
      data: { id: "7" },
    });
    expect(sleep).toHaveBeenCalledWith(2000);
    const init = fetchImpl.mock.calls[0][1];
    expect(init.method).toBe("POST");
    expect(init.body).toBe('{"a":1}');
  });

  it("clamps Retry-After to the configured maximum", async () => {
    const { client, fetchImpl, sleep } = createClient({
      retry: { maxRetryAfterMs: 60_000 },
    });
    fetchImpl
      .mockResolvedValueOnce(
        new Response("", { status: 429, headers: { "retry-after": "120" } }),
      )
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    await client.get("/users");
    expect(sleep).toHaveBeenCalledWith(60_000);
  });

  it("does not retry POST on server errors", async () => {
    const { client, fetchImpl } = createClient();
    fetchImpl.mockResolvedValueOnce(new Response("down", { status: 503 }));

    const error = await client.post("/candidates", {}).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 503, bodySnippet: "down" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts", async () => {
    const { client, fetchImpl, sleep } = createClient({
      retry: { maxAttempts: 3 },
    });
    fetchImpl.mockImplementation(
      async () => new Response("boom", { status: 500 }),
    );

    await expect(client.get("/jobs")).rejects.toBeInstanceOf(HttpError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
  });

  it("never retries other 4xx responses and truncates the body", async () => {
    const { client, fetchImpl } = createClient();
    fetchImpl.mockResolvedValueOnce(
      new Response("x".repeat(500), { status: 404, statusText: "Not Found" }),
    );

    const error = await client.get("/jobs/1").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(404);
      expect(error.bodySnippet).toHaveLength(200);
      expect(error.url).toBe("https://api.example.test/v1/jobs/1");
    }
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("retries network errors only for idempotent methods", async () => {
    const { client, fetchImpl } = createClient();
    fetchImpl
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    await expect(client.get("/health")).resolves.toEqual({ ok: true });

    fetchImpl.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(client.patch("/candidates/1", {})).rejects.toThrow(
      "fetch failed",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("aborts an attempt that exceeds timeoutMs and retries it", async () => {
    const { client, fetchImpl, sleep } = createClient({
      timeoutMs: 20,
      retry: { maxAttempts: 2 },
    });
    fetchImpl.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(abortError()));
        }),
    );

    await expect(client.get("/slow")).rejects.toThrow("request aborted");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("keeps the timeout running while the body is read", async () => {
    const { client, fetchImpl } = createClient({
      timeoutMs: 20,
      retry: { maxAttempts: 1 },
    });
    fetchImpl.mockImplementation(async (_url, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode("[1,"));
          init.signal?.addEventListener("abort", () => controller.error(abortError()));
        },
      });
      return new Response(body, { headers: { "content-type": "application/json" } });
    });

    await expect(client.get("/stalled")).rejects.toThrow();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("pauses until the rate-limit window resets", async () => {
    const { client, fetchImpl, sleep } = createClient();
    fetchImpl
      .mockResolvedValueOnce(
        jsonResponse([], 200, {
          "x-rate-limit-remaining": "0",
          "x-rate-limit-reset": "5",
        }),
      )
      .mockResolvedValueOnce(jsonResponse([]));

    await client.get("/candidates");
    expect(sleep).not.toHaveBeenCalled();
    await client.get("/candidates");
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it("spaces consecutive requests by minIntervalMs", async () => {
    const { client, fetchImpl, sleep } = createClient({ minIntervalMs: 200 });
    fetchImpl.mockImplementation(async () => jsonResponse({}));

    await client.get("/a");
    await client.get("/b");
    expect(sleep.mock.calls).toEqual([[200]]);
  });

  it("returns null for empty responses and sends default headers", async () => {
    const { client, fetchImpl } = createClient({
      headers: { Authorization: "Token token=test-token" },
    });
    fetchImpl.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await expect(client.delete("/comments/3")).resolves.toBeNull();
    const init = fetchImpl.mock.calls[0][1];
    expect(init.headers).toEqual({ Authorization: "Token token=test-token" });
  });
});
