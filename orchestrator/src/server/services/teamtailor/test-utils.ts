import { getRecord, getString, isRecord, type UnknownRecord } from "@shared/utils/records";
import { createTestHttpClient, jsonResponse } from "../http/test-utils";
import { TeamtailorClient } from "./client";

export interface FakeResource {
  id: string;
  type: string;
  attributes: UnknownRecord;
  relationships: UnknownRecord;
}

const JSON_API = { "content-type": "application/vnd.api+json" };

function readData(init: RequestInit): UnknownRecord {
  const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : null;
  return (isRecord(body) ? getRecord(body, "data") : undefined) ?? {};
}

function matchesFilters(
  item: FakeResource,
  filters: [string, string][],
  inPool: (poolId: string, candidateId: string) => boolean,
): boolean {
  return filters.every(([key, value]) =>
    item.type === "candidates" && key === "prospect-pool-id"
      ? inPool(value, item.id)
      : String(item.attributes[key] ?? "") === value,
  );
}

/**
 * In-process Teamtailor: keeps resources per type, rejects a second create
 * with the same external id (422) and answers `filter[<attribute>]` queries.
 * Candidates filtered by `prospect-pool-id` are looked up through the pool
 * memberships.
 */
export function createFakeTeamtailor() {
  const resources = new Map<string, FakeResource[]>();
  let nextId = 1;

  function list(type: string): FakeResource[] {
    const existing = resources.get(type);
    if (existing) return existing;
    const created: FakeResource[] = [];
    resources.set(type, created);
    return created;
  }

  function seed(type: string, attributes: UnknownRecord): FakeResource {
    const resource = {
      id: String(nextId++),
      type,
      attributes,
      relationships: {},
    };
    list(type).push(resource);
    return resource;
  }

  function inPool(poolId: string, candidateId: string): boolean {
    return list("prospect_pool_candidates").some(
      (membership) =>
        String(membership.attributes["prospect-pool-id"]) === poolId &&
        String(membership.attributes["candidate-id"]) === candidateId,
    );
  }

  const { client: http, fetchImpl } = createTestHttpClient((url, init) => {
    const [type = "", id] = url.pathname
      .split("/")
      .slice(2)
      .filter((segment) => segment !== "metadata");
    const items = list(type);

    if (init.method === "POST") {
      const data = readData(init);
      const attributes = getRecord(data, "attributes") ?? {};
      const externalId = getString(attributes, "external-id");
      if (
        externalId &&
        items.some((item) => item.attributes["external-id"] === externalId)
      ) {
        return new Response('{"errors":[{"detail":"external-id taken"}]}', {
          status: 422,
        });
      }
      const resource = seed(type, attributes);
      resource.relationships = getRecord(data, "relationships") ?? {};
      return jsonResponse({ data: resource }, 201, JSON_API);
    }

    if (init.method === "PATCH") {
      const resource = items.find((item) => item.id === id);
      if (!resource) return new Response("", { status: 404 });
      resource.attributes = {
        ...resource.attributes,
        ...(getRecord(readData(init), "attributes") ?? {}),
      };
      return jsonResponse({ data: resource }, 200, JSON_API);
    }

    if (init.method === "DELETE") {
      const index = items.findIndex((item) => item.id === id);
      if (index < 0) return new Response("", { status: 404 });
      items.splice(index, 1);
      return new Response(null, { status: 204 });
    }

    if (id) {
      const resource = items.find((item) => item.id === id);
      return resource
        ? jsonResponse({ data: resource }, 200, JSON_API)
        : new Response("", { status: 404 });
    }

    const filters: [string, string][] = [];
    for (const [key, value] of url.searchParams) {
      const match = /^filter\[(.+)\]$/.exec(key);
      if (match?.[1]) filters.push([match[1], value]);
    }
    const matching = items.filter((item) => matchesFilters(item, filters, inPool));
    return jsonResponse(
      { data: matching, links: {}, meta: { "record-count": matching.length } },
      200,
      JSON_API,
    );
  });

  return {
    client: new TeamtailorClient(http),
    fetchImpl,
    resources,
    list,
    seed,
  };
}
