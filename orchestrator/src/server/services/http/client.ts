/**
 * Shared HTTP client for upstream ATS APIs.
 *
 * - spaces consecutive requests by `minIntervalMs` and pauses until a
 *   rate-limit window resets once the upstream reports zero remaining calls
 * - retries transient failures with exponential backoff and jitter, honouring
 *   `Retry-After`
 * - aborts each attempt after `timeoutMs`
 */

import { type Logger, logger as rootLogger } from "@infra/logger";
import { HttpError } from "./errors";

export type HttpMethod =
  | "GET"
  | "HEAD"
  | "OPTIONS"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE";

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | QueryScalar[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetryAfterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
};

export const DEFAULT_TIMEOUT_MS = 30_000;

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  408, 429, 500, 502, 503, 504,
]);

const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set([
  "GET",
  "HEAD",
  "OPTIONS",
  "PUT",
  "DELETE",
]);

const MAX_ERROR_BODY = 200;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  name: string;
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  minIntervalMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

export interface HttpRequest {
  method?: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface HttpResult {
  status: number;
  url: string;
  headers: Headers;
  data: unknown;
}

export function buildUrl(
  baseUrl: string,
  path: string,
  query?: QueryParams,
): string {
  const url = /^https?:\/\//i.test(path)
    ? new URL(path)
    : new URL(`${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);

  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) url.searchParams.append(key, String(item));
      continue;
    }
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Returns the wait in milliseconds encoded by a `Retry-After` header (delta
 * seconds or an HTTP date), or null when absent or unparseable.
 */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now(),
): number | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/**
 * Rate-limit reset headers come either as seconds until reset or as an epoch
 * timestamp in seconds.
 */
export function parseRateLimitReset(
  value: string | null,
  now: number = Date.now(),
): number | null {
  const trimmed = value?.trim();
  if (!trimmed || !/^\d+(\.\d+)?$/.test(trimmed)) return null;
  const numeric = Number(trimmed);
  if (numeric > 1_000_000_000) {
    return Math.max(0, Math.round(numeric * 1000 - now));
  }
  return Math.round(numeric * 1000);
}

export function computeBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(config.maxDelayMs, exponential);
  return Math.max(0, Math.round(capped * (0.5 + random() * 0.5)));
}

export function isRetryableStatus(method: HttpMethod, status: number): boolean {
  if (status === 429) return true;
  return IDEMPOTENT_METHODS.has(method) && RETRYABLE_STATUS_CODES.has(status);
}

/** Parses an RFC 8288 `Link` header into a map of rel → URL. */
export function parseLinkHeader(value: string | null): Record<string, string> {
  const links: Record<string, string> = {};
  if (!value) return links;
  for (const part of value.split(/,\s*(?=<)/)) {
    const match = /^\s*<([^>]+)>\s*;(.*)$/.exec(part);
    if (!match) continue;
    const [, url, params] = match;
    const rel = /rel="?([^";]+)"?/i.exec(params)?.[1];
    if (!rel) continue;
    for (const name of rel.trim().split(/\s+/)) {
      links[name.toLowerCase()] = url;
    }
  }
  return links;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

function parseBody(response: Response, text: string): unknown {
  if (response.status === 204 || !text) return null;
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("json")) return text;
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

function toHttpError(response: Response, url: string, text: string): HttpError {
  return new HttpError({
    status: response.status,
    statusText: response.statusText,
    url,
    bodySnippet: text.slice(0, MAX_ERROR_BODY),
    headers: headersToRecord(response.headers),
  });
}

interface Attempt {
  response: Response;
  text: string;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export class HttpClient {
  readonly name: string;
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly minIntervalMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly log: Logger;
  private nextSlotAt = 0;

  constructor(options: HttpClientOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ client: options.name });
  }

  async request(req: HttpRequest): Promise<HttpResult> {
    const method = req.method ?? "GET";
    const url = buildUrl(this.baseUrl, req.path, req.query);
    const headers: Record<string, string> = { ...this.headers, ...req.headers };
    let body: string | undefined;
    if (req.body !== undefined) {
      body = typeof req.body === "string" ? req.body : JSON.stringify(req.body);
      if (!Object.keys(headers).some((k) => k.toLowerCase() === "content-type")) {
        headers["Content-Type"] = "application/json";
      }
    }

    for (let attempt = 1; ; attempt++) {
      await this.waitForSlot();

      let attemptResult: Attempt;
      try {
        attemptResult = await this.send(url, { method, headers, body });
      } catch (error) {
        if (attempt >= this.retry.maxAttempts || !IDEMPOTENT_METHODS.has(method)) {
          throw error;
        }
        const delayMs = computeBackoffDelay(attempt, this.retry, this.random);
        this.log.warn("Upstream request failed, retrying", {
          method,
          url,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
        await this.sleep(delayMs);
        continue;
      }

      const { response, text } = attemptResult;
      if (response.ok) {
        this.trackRateLimit(response.headers);
        return {
          status: response.status,
          url,
          headers: response.headers,
          data: parseBody(response, text),
        };
      }

      if (
        attempt >= this.retry.maxAttempts ||
        !isRetryableStatus(method, response.status)
      ) {
        throw toHttpError(response, url, text);
      }

      const delayMs = this.retryDelay(response.headers, attempt);
      this.log.warn("Upstream responded with retryable status", {
        method,
        url,
        status: response.status,
        attempt,
        delayMs,
      });
      await this.sleep(delayMs);
    }
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    return (await this.request({ method: "GET", path, query })).data;
  }

  async post(path: string, body: unknown, query?: QueryParams): Promise<unknown> {
    return (await this.request({ method: "POST", path, body, query })).data;
  }

  async patch(path: string, body: unknown): Promise<unknown> {
    return (await this.request({ method: "PATCH", path, body })).data;
  }

  async delete(path: string): Promise<unknown> {
    return (await this.request({ method: "DELETE", path })).data;
  }

  private retryDelay(headers: Headers, attempt: number): number {
    const now = this.now();
    const retryAfter = parseRetryAfter(headers.get("retry-after"), now);
    if (retryAfter !== null) {
      return Math.min(retryAfter, this.retry.maxRetryAfterMs);
    }
    const reset = this.rateLimitResetMs(headers, now);
    if (reset !== null) return Math.min(reset, this.retry.maxRetryAfterMs);
    return computeBackoffDelay(attempt, this.retry, this.random);
  }

  private rateLimitResetMs(headers: Headers, now: number): number | null {
    const remaining =
      headers.get("x-rate-limit-remaining") ??
      headers.get("x-ratelimit-remaining");
    if (remaining === null || Number(remaining) > 0) return null;
    return parseRateLimitReset(
      headers.get("x-rate-limit-reset") ?? headers.get("x-ratelimit-reset"),
      now,
    );
  }

  private trackRateLimit(headers: Headers): void {
    const now = this.now();
    const reset = this.rateLimitResetMs(headers, now);
    if (reset === null) return;
    const resumeAt = now + Math.min(reset, this.retry.maxRetryAfterMs);
    if (resumeAt > this.nextSlotAt) {
      this.log.info("Rate limit exhausted, pausing requests", {
        resumeInMs: resumeAt - now,
      });
      this.nextSlotAt = resumeAt;
    }
  }

  private async waitForSlot(): Promise<void> {
    const now = this.now();
    const waitMs = this.nextSlotAt - now;
    this.nextSlotAt = Math.max(now, this.nextSlotAt) + this.minIntervalMs;
    if (waitMs > 0) await this.sleep(waitMs);
  }

  /** One attempt; `timeoutMs` covers the headers and the whole body. */
  private async send(url: string, init: RequestInit): Promise<Attempt> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        ...init,
        signal: controller.signal,
      });
      return { response, text: await response.text() };
    } finally {
      clearTimeout(timer);
    }
  }
}
