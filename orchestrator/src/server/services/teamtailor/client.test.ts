import { describe, expect, it, vi } from "vitest";
import { getConfig } from "@server/config/app-config";
import type { FetchLike } from "../http/client";
import { HttpError } from "../http/errors";
import { createTestHttpClient, jsonResponse } from "../http/test-utils";
import { TeamtailorClient } from "./client";

const JSON_API = { "content-type": "application/vnd.api+json" };

function parseBody(init: RequestInit): unknown {
  return typeof init.body === "string" ? JSON.parse(init.body) : null;
}

describe("TeamtailorClient", () => {
  it("sends token, version and JSON:API headers", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      jsonResponse({ data: [{ id: "9", type: "candidates" }] }, 200, JSON_API),
    );
    const client = TeamtailorClient.fromConfig(
      getConfig({ TT_TOKEN: "test-token" }),
      { fetchImpl, minIntervalMs: 0 },
    );

    await expect(
      client.findIdByExternalId("candidates", "gh_cand_1"),
    ).resolves.toBe("9");

    const [url, init] = fetchImpl.mock.calls[0];
    const parsed = new URL(url);
    expect(parsed.origin + parsed.pathname).toBe(
      "https://api.na.teamtailor.com/v1/candidates",
    );
    expect(parsed.searchParams.get("filter[external-id]")).toBe("gh_cand_1");
    expect(init.headers).toEqual({
      Authorization: "Token token=test-token",
      "X-Api-Version": "20240904",
      "Content-Type": "application/vnd.api+json",
      Accept: "application/vnd.api+json",
    });
  });

  it("returns null when no resource carries the external id", async () => {
    const { client: http } = createTestHttpClient(() =>
      jsonResponse({ data: [] }, 200, JSON_API),
    );
    const client = new TeamtailorClient(http);
    await expect(client.findIdByExternalId("jobs", "gh_job_1")).resolves.toBeNull();
  });

  it("follows links.next across pages", async () => {
    const { client: http, fetchImpl } = createTestHttpClient((url) => {
      if (url.searchParams.get("page[number]") === "2") {
        return jsonResponse(
          { data: [{ id: "2", type: "candidates", attributes: {} }], links: {} },
          200,
          JSON_API,
        );
      }
      return jsonResponse(
        {
          data: [{ id: "1", type: "candidates", attributes: { tags: ["a"] } }],
          links: {
            next: "https://upstream.test/v1/candidates?page%5Bnumber%5D=2&page%5Bsize%5D=30",
          },
        },
        200,
        JSON_API,
      );
    });
    const client = new TeamtailorClient(http);

    const resources = await client.listAll("/candidates", {}, { pageSize: 100 });
    expect(resources.map((resource) => resource.id)).toEqual(["1", "2"]);
    expect(resources[0].attributes).toEqual({ tags: ["a"] });
    expect(new URL(fetchImpl.mock.calls[0][0]).searchParams.get("page[size]")).toBe(
      "30",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("stops paging once maxItems is reached", async () => {
    const { client: http, fetchImpl } = createTestHttpClient(() =>
      jsonResponse(
        {
          data: [
            { id: "1", type: "candidates" },
            { id: "2", type: "candidates" },
          ],
          links: { next: "https://upstream.test/v1/candidates?page%5Bnumber%5D=2" },
        },
        200,
        JSON_API,
      ),
    );
    const client = new TeamtailorClient(http);

    const resources = await client.listAll("/candidates", {}, { maxItems: 1 });
    expect(resources.map((resource) => resource.id)).toEqual(["1"]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("creates resources and normalises numeric ids", async () => {
    const { client: http, fetchImpl } = createTestHttpClient(() =>
      jsonResponse({ data: { id: 5, type: "jobs" } }, 201, JSON_API),
    );
    const client = new TeamtailorClient(http);

    await expect(
      client.upsert({
        type: "jobs",
        externalId: "gh_job_5",
        attributes: { title: "Backend Engineer" },
      }),
    ).resolves.toEqual({ id: "5", action: "created" });
    expect(parseBody(fetchImpl.mock.calls[0][1])).toEqual({
      data: {
        type: "jobs",
        attributes: { title: "Backend Engineer", "external-id": "gh_job_5" },
      },
    });
  });

  it("updates the existing resource when create conflicts", async () => {
    const { client: http, fetchImpl } = createTestHttpClient((url, init) => {
      if (init.method === "POST") {
        return new Response('{"errors":[{"detail":"taken"}]}', { status: 422 });
      }
      if (init.method === "PATCH") {
        return jsonResponse({ data: { id: "77", type: "candidates" } }, 200, JSON_API);
      }
      expect(url.searchParams.get("filter[external-id]")).toBe("gh_cand_1");
      return jsonResponse({ data: [{ id: "77", type: "candidates" }] }, 200, JSON_API);
    });
    const client = new TeamtailorClient(http);

    await expect(
      client.upsert({
        type: "candidates",
        externalId: "gh_cand_1",
        attributes: { "first-name": "Ada" },
      }),
    ).resolves.toEqual({ id: "77", action: "updated" });

    const patch = fetchImpl.mock.calls[2];
    expect(new URL(patch[0]).pathname).toBe("/v1/candidates/77");
    expect(parseBody(patch[1])).toEqual({
      data: {
        id: "77",
        type: "candidates",
        attributes: { "first-name": "Ada", "external-id": "gh_cand_1" },
      },
    });
  });

  it("rethrows the conflict when no existing resource matches", async () => {
    const { client: http } = createTestHttpClient((_url, init) =>
      init.method === "POST"
        ? new Response("invalid", { status: 422 })
        : jsonResponse({ data: [] }, 200, JSON_API),
    );
    const client = new TeamtailorClient(http);

    const error = await client
      .upsert({ type: "jobs", externalId: "gh_job_1", attributes: {} })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 422 });
  });
});
