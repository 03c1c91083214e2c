/**
 * Greenhouse Harvest API client.
 *
 * Harvest authenticates with HTTP Basic auth: the API key is the username and
 * the password is empty.
 */

import { type AppConfig, getConfig, requireGreenhouseApiKey } from "@server/config/app-config";
import {
  HttpClient,
  type HttpClientOptions,
  parseLinkHeader,
  type QueryParams,
} from "@server/services/http/client";
import { isRecord, type UnknownRecord } from "@shared/utils/records";

const MAX_PAGES = 10_000;

export interface PaginatedResult {
  data: unknown[];
  metadata: {
    count: number;
    page: number;
    perPage: number;
    note?: string;
  };
}

export function buildBasicAuthHeader(apiKey: string): string {
  const credentials = apiKey.includes(":") ? apiKey : `${apiKey}:`;
  return `Basic ${Buffer.from(credentials).toString("base64")}`;
}

function toRecordList(data: unknown): UnknownRecord[] {
  if (Array.isArray(data)) return data.filter(isRecord);
  if (isRecord(data)) return [data];
  return [];
}

export class GreenhouseClient {
  constructor(
    private readonly http: HttpClient,
    readonly perPage: number,
  ) {}

  static fromConfig(
    config: AppConfig = getConfig(),
    overrides: Partial<HttpClientOptions> = {},
  ): GreenhouseClient {
    const apiKey = requireGreenhouseApiKey(config);
    const http = new HttpClient({
      name: "greenhouse",
      baseUrl: config.GREENHOUSE_API_URL,
      headers: {
        Authorization: buildBasicAuthHeader(apiKey),
        Accept: "application/json",
        "User-Agent": "ats-bridge/0.1",
      },
      timeoutMs: config.HTTP_TIMEOUT_MS,
      retry: { maxAttempts: config.HTTP_MAX_ATTEMPTS },
      minIntervalMs: config.HTTP_MIN_INTERVAL_MS,
      ...overrides,
    });
    return new GreenhouseClient(http, config.BATCH_SIZE);
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    return this.http.get(path, query);
  }

  async getRecord(path: string): Promise<UnknownRecord | null> {
    const data = await this.http.get(path);
    return isRecord(data) ? data : null;
  }

  /**
   * Walks `page=1,2,...` until the API returns an empty page. A `Link` header
   * without `rel="next"`, or a short page when no `Link` header is sent,
   * also ends the walk.
   */
  async fetchAll(path: string, query: QueryParams = {}): Promise<UnknownRecord[]> {
    const records: UnknownRecord[] = [];
    for (let page = 1; page <= MAX_PAGES; page++) {
      const result = await this.http.request({
        path,
        query: { ...query, per_page: this.perPage, page },
      });
      const items = toRecordList(result.data);
      if (items.length === 0) break;
      records.push(...items);
      if (!Array.isArray(result.data)) break;

      const link = result.headers.get("link");
      if (link !== null) {
        if (!parseLinkHeader(link).next) break;
      } else if (items.length < this.perPage) {
        break;
      }
    }
    return records;
  }

  async paginatedGet(
    path: string,
    options: { page: number; perPage: number; query?: QueryParams },
  ): Promise<PaginatedResult> {
    const { page, perPage } = options;
    const data = await this.http.get(path, {
      ...options.query,
      page,
      per_page: perPage,
    });
    if (Array.isArray(data)) {
      return { data, metadata: { count: data.length, page, perPage } };
    }
    return {
      data: [data],
      metadata: { count: 1, page, perPage, note: "Non-paginated response" },
    };
  }
}

let cachedClient: { key: string; client: GreenhouseClient } | null = null;

/** Returns a client for the current configuration, reusing it between calls. */
export function getGreenhouseClient(): GreenhouseClient {
  const config = getConfig();
  const key = [
    config.GREENHOUSE_API_URL,
    config.GREENHOUSE_API_KEY,
    config.BATCH_SIZE,
  ].join("|");
  if (!cachedClient || cachedClient.key !== key) {
    cachedClient = { key, client: GreenhouseClient.fromConfig(config) };
  }
  return cachedClient.client;
}
