import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startServer, stopServer } from "./test-utils";

describe.sequential("Greenhouse proxy routes", () => {
  let server: Server;
  let baseUrl: string;
  let closeDb: () => void;
  let tempDir: string;
  let upstreamPaths: string[];

  beforeEach(async () => {
    ({ server, baseUrl, closeDb, tempDir } = await startServer());
    upstreamPaths = [];

    const { createTestHttpClient, jsonResponse } = await import(
      "../../services/http/test-utils"
    );
    const { client: http } = createTestHttpClient((url) => {
      upstreamPaths.push(`${url.pathname}${url.search}`);
      if (url.pathname === "/v1/candidates") return jsonResponse([{ id: 1 }]);
      if (url.pathname === "/v1/jobs/7") return jsonResponse({ id: 7, name: "Designer" });
      if (url.pathname === "/v1/jobs/500") return new Response("boom", { status: 500 });
      if (url.pathname.startsWith("/v1/applications/")) return jsonResponse({ id: 3 });
      return new Response("missing", { status: 404, statusText: "Not Found" });
    });
    const { GreenhouseClient, getGreenhouseClient } = await import(
      "../../services/greenhouse/client"
    );
    vi.mocked(getGreenhouseClient).mockReturnValue(new GreenhouseClient(http, 100));
  });

  afterEach(async () => {
    await stopServer({ server, closeDb, tempDir });
  });

  it("proxies paginated collections", async () => {
    const res = await fetch(`${baseUrl}/api/greenhouse/candidates?page=2&per_page=5`);
    const body = await res.json();
    expect(res.status).toBe(200);
    expect(body.data).toEqual({
      data: [{ id: 1 }],
      metadata: { count: 1, page: 2, perPage: 5 },
    });
    expect(upstreamPaths).toEqual(["/v1/candidates?page=2&per_page=5"]);
  });

  it("validates pagination and ids", async () => {
    const badPage = await fetch(`${baseUrl}/api/greenhouse/candidates?per_page=5000`);
    expect(badPage.status).toBe(400);
    expect((await badPage.json()).error.code).toBe("INVALID_REQUEST");

    const badId = await fetch(`${baseUrl}/api/greenhouse/jobs/abc`);
    expect(badId.status).toBe(400);
    expect(upstreamPaths).toEqual([]);
  });

  it("proxies single records and nested resources", async () => {
    const job = await fetch(`${baseUrl}/api/greenhouse/jobs/7`);
    expect((await job.json()).data).toEqual({ id: 7, name: "Designer" });

    await fetch(`${baseUrl}/api/greenhouse/applications/3/offer`);
    await fetch(`${baseUrl}/api/greenhouse/applications/3/demographics/answers`);
    expect(upstreamPaths).toEqual([
      "/v1/jobs/7",
      "/v1/applications/3/offers/current_offer",
      "/v1/applications/3/demographics/answers",
    ]);
  });

  it("maps upstream errors", async () => {
    const missing = await fetch(`${baseUrl}/api/greenhouse/jobs/8`);
    expect(missing.status).toBe(404);
    expect((await missing.json()).error.code).toBe("NOT_FOUND");

    const broken = await fetch(`${baseUrl}/api/greenhouse/jobs/500`);
    expect(broken.status).toBe(502);
    const body = await broken.json();
    expect(body.error.code).toBe("UPSTREAM_ERROR");
    expect(body.error.details.upstreamStatus).toBe(500);
  });

  it("answers unknown API routes with 404", async () => {
    const res = await fetch(`${baseUrl}/api/greenhouse/prospects`);
    expect(res.status).toBe(404);
    expect((await res.json()).error).toEqual({
      code: "NOT_FOUND",
      message: "Route not found: GET /api/greenhouse/prospects",
    });
  });
});
