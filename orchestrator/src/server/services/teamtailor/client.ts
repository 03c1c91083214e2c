/**
 * Teamtailor JSON:API client.
 *
 * Resources carry an `external-id` attribute; `upsert` relies on it to turn a
 * conflicting create into an update of the existing record.
 */

import { type AppConfig, getConfig, requireTeamtailorToken } from "@server/config/app-config";
import {
  HttpClient,
  type HttpClientOptions,
  type QueryParams,
} from "@server/services/http/client";
import { isHttpError } from "@server/services/http/errors";
import { z } from "zod";

export const MAX_PAGE_SIZE = 30;
export const PROSPECT_POOLS_PATH = "/metadata/prospect_pools";
export const POOL_CANDIDATES_PATH = "/prospect_pool_candidates";
const JSON_API_MEDIA_TYPE = "application/vnd.api+json";

const resourceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  type: z.string(),
  attributes: z.record(z.unknown()).default({}),
  relationships: z.record(z.unknown()).optional(),
});

const documentSchema = z.object({
  data: z.union([resourceSchema, z.array(resourceSchema), z.null()]).optional(),
  links: z.object({ next: z.string().nullish() }).passthrough().optional(),
  meta: z.record(z.unknown()).optional(),
});

export type TeamtailorResource = z.infer<typeof resourceSchema>;
export type JsonApiDocument = z.infer<typeof documentSchema>;

export interface ResourceIdentifier {
  type: string;
  id: string;
}

export type Relationships = Record<string, { data: ResourceIdentifier | null }>;

export interface UpsertInput {
  type: string;
  externalId: string;
  attributes: Record<string, unknown>;
  relationships?: Relationships;
}

export interface UpsertResult {
  id: string;
  action: "created" | "updated";
}

export function relationship(type: string, id: string | null): {
  data: ResourceIdentifier | null;
} {
  return { data: id ? { type, id } : null };
}

export function resourceList(document: JsonApiDocument): TeamtailorResource[] {
  if (!document.data) return [];
  return Array.isArray(document.data) ? document.data : [document.data];
}

function firstResource(document: JsonApiDocument, url: string): TeamtailorResource {
  const [resource] = resourceList(document);
  if (!resource) {
    throw new Error(`Teamtailor returned no resource for ${url}`);
  }
  return resource;
}

export class TeamtailorClient {
  constructor(private readonly http: HttpClient) {}

  static fromConfig(
    config: AppConfig = getConfig(),
    overrides: Partial<HttpClientOptions> = {},
  ): TeamtailorClient {
    const token = requireTeamtailorToken(config);
    const http = new HttpClient({
      name: "teamtailor",
      baseUrl: config.TT_BASE_URL,
      headers: {
        Authorization: `Token token=${token}`,
        "X-Api-Version": config.TT_API_VERSION,
        "Content-Type": JSON_API_MEDIA_TYPE,
        Accept: JSON_API_MEDIA_TYPE,
      },
      timeoutMs: config.HTTP_TIMEOUT_MS,
      retry: { maxAttempts: config.HTTP_MAX_ATTEMPTS },
      minIntervalMs: config.HTTP_MIN_INTERVAL_MS,
      ...overrides,
    });
    return new TeamtailorClient(http);
  }

  async get(path: string, query?: QueryParams): Promise<JsonApiDocument> {
    return documentSchema.parse((await this.http.get(path, query)) ?? {});
  }

  async getResource(path: string): Promise<TeamtailorResource> {
    return firstResource(await this.get(path), path);
  }

  async post(path: string, body: unknown): Promise<JsonApiDocument> {
    return documentSchema.parse((await this.http.post(path, body)) ?? {});
  }

  async patch(path: string, body: unknown): Promise<JsonApiDocument> {
    return documentSchema.parse((await this.http.patch(path, body)) ?? {});
  }

  async delete(path: string): Promise<void> {
    await this.http.delete(path);
  }

  async create(
    type: string,
    attributes: Record<string, unknown>,
    relationships?: Relationships,
  ): Promise<TeamtailorResource> {
    const path = `/${type}`;
    const document = await this.post(path, {
      data: { type, attributes, ...(relationships ? { relationships } : {}) },
    });
    return firstResource(document, path);
  }

  async update(
    type: string,
    id: string,
    attributes: Record<string, unknown>,
    relationships?: Relationships,
  ): Promise<void> {
    await this.patch(`/${type}/${id}`, {
      data: { id, type, attributes, ...(relationships ? { relationships } : {}) },
    });
  }

  /**
   * Follows `links.next` from the first page until it is absent or
   * `maxItems` resources were collected.
   */
  async listAll(
    path: string,
    query: QueryParams = {},
    options: { maxItems?: number; pageSize?: number } = {},
  ): Promise<TeamtailorResource[]> {
    const maxItems = options.maxItems ?? Number.POSITIVE_INFINITY;
    const pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
    const resources: TeamtailorResource[] = [];

    let document = await this.get(path, {
      ...query,
      "page[size]": pageSize,
      "page[number]": 1,
    });
    for (;;) {
      const page = resourceList(document);
      resources.push(...page);
      const next = document.links?.next;
      if (!next || page.length === 0 || resources.length >= maxItems) break;
      document = await this.get(next);
    }
    return resources.slice(0, maxItems);
  }

  async findIdByExternalId(type: string, externalId: string): Promise<string | null> {
    const document = await this.get(`/${type}`, {
      "filter[external-id]": externalId,
      "page[size]": 1,
    });
    return resourceList(document)[0]?.id ?? null;
  }

  /**
   * Creates the resource; when Teamtailor rejects it as a duplicate (409 or
   * 422) the existing record with the same external id is updated instead.
   */
  async upsert(input: UpsertInput): Promise<UpsertResult> {
    const attributes = { ...input.attributes, "external-id": input.externalId };
    try {
      const created = await this.create(input.type, attributes, input.relationships);
      return { id: created.id, action: "created" };
    } catch (error) {
      if (!isHttpError(error) || (error.status !== 409 && error.status !== 422)) {
        throw error;
      }
      const existingId = await this.findIdByExternalId(input.type, input.externalId);
      if (!existingId) throw error;
      await this.update(input.type, existingId, attributes, input.relationships);
      return { id: existingId, action: "updated" };
    }
  }

  // Prospect pools live under the metadata namespace; memberships are their
  // own resource linking one candidate to one pool.

  async listProspectPools(): Promise<TeamtailorResource[]> {
    return this.listAll(PROSPECT_POOLS_PATH);
  }

  async getProspectPool(poolId: string): Promise<TeamtailorResource> {
    return this.getResource(`${PROSPECT_POOLS_PATH}/${encodeURIComponent(poolId)}`);
  }

  async createProspectPool(
    attributes: Record<string, unknown>,
  ): Promise<TeamtailorResource> {
    const document = await this.post(PROSPECT_POOLS_PATH, {
      data: { type: "prospect-pools", attributes },
    });
    return firstResource(document, PROSPECT_POOLS_PATH);
  }

  async updateProspectPool(
    poolId: string,
    attributes: Record<string, unknown>,
  ): Promise<TeamtailorResource> {
    const path = `${PROSPECT_POOLS_PATH}/${encodeURIComponent(poolId)}`;
    const document = await this.patch(path, {
      data: { id: poolId, type: "prospect-pools", attributes },
    });
    return firstResource(document, path);
  }

  async deleteProspectPool(poolId: string): Promise<void> {
    await this.delete(`${PROSPECT_POOLS_PATH}/${encodeURIComponent(poolId)}`);
  }

  async addToProspectPool(
    poolId: string,
    candidateId: string,
  ): Promise<TeamtailorResource> {
    const document = await this.post(POOL_CANDIDATES_PATH, {
      data: {
        type: "prospect_pool_candidates",
        attributes: { "candidate-id": candidateId, "prospect-pool-id": poolId },
      },
    });
    return firstResource(document, POOL_CANDIDATES_PATH);
  }

  async findPoolMembershipId(
    poolId: string,
    candidateId: string,
  ): Promise<string | null> {
    const document = await this.get(POOL_CANDIDATES_PATH, {
      "filter[candidate-id]": candidateId,
      "filter[prospect-pool-id]": poolId,
      "page[size]": 1,
    });
    return resourceList(document)[0]?.id ?? null;
  }

  async removePoolMembership(membershipId: string): Promise<void> {
    await this.delete(`${POOL_CANDIDATES_PATH}/${encodeURIComponent(membershipId)}`);
  }
}

let cachedClient: { key: string; client: TeamtailorClient } | null = null;

export function getTeamtailorClient(): TeamtailorClient {
  const config = getConfig();
  const key = [config.TT_BASE_URL, config.TT_TOKEN, config.TT_API_VERSION].join("|");
  if (!cachedClient || cachedClient.key !== key) {
    cachedClient = { key, client: TeamtailorClient.fromConfig(config) };
  }
  return cachedClient.client;
}
