import { vi } from "vitest";
import { type FetchLike, HttpClient, type HttpClientOptions } from "./client";

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export type RouteHandler = (
  url: URL,
  init: RequestInit,
) => Response | Promise<Response>;

/**
 * In-process stand-in for an upstream API: the handler receives the parsed
 * URL and returns a Response. Unmatched requests should return 404.
 */
export function createTestHttpClient(
  handler: RouteHandler,
  overrides: Partial<HttpClientOptions> = {},
) {
  const fetchImpl = vi.fn<FetchLike>(async (url, init) =>
    handler(new URL(url), init),
  );
  const client = new HttpClient({
    name: "test",
    baseUrl: "https://upstream.test/v1",
    fetchImpl,
    sleep: async () => {},
    random: () => 0,
    retry: { maxAttempts: 1 },
    ...overrides,
  });
  return { client, fetchImpl };
}
