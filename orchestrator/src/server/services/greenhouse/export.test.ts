import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestHttpClient, jsonResponse } from "../http/test-utils";
import { readRecords } from "../storage";
import { GreenhouseClient } from "./client";
import { exportAll, exportEntity, runWithConcurrency } from "./export";

describe("runWithConcurrency", () => {
  it("processes every item without exceeding the worker count", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];
    await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      seen.push(item);
      active--;
    });
    expect(seen.sort()).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it("handles falsy items and empty input", async () => {
    const seen: number[] = [];
    await runWithConcurrency([0, 0], 4, async (item) => {
      seen.push(item);
    });
    await runWithConcurrency([], 4, async () => {});
    expect(seen).toEqual([0, 0]);
  });
});

describe.sequential("greenhouse export", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "ats-bridge-export-"));
    process.env.DATA_DIR = tempDir;
  });

  afterEach(async () => {
    delete process.env.DATA_DIR;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("enriches jobs and keeps records whose sub-fetch fails", async () => {
    const { client: http } = createTestHttpClient((url) => {
      switch (url.pathname) {
        case "/v1/jobs":
          return jsonResponse([
            { id: 1, name: "Backend Engineer" },
            { id: 2, name: "Designer" },
          ]);
        case "/v1/jobs/1/job_posts":
          return jsonResponse([{ id: 11, content: "<p>Build</p>" }]);
        case "/v1/jobs/2/stages":
          return new Response("boom", { status: 500 });
        default:
          return jsonResponse([]);
      }
    });
    const client = new GreenhouseClient(http, 100);

    const summary = await exportEntity("jobs", { client, concurrency: 2 });

    expect(summary).toEqual({
      entity: "jobs",
      count: 2,
      status: "ok",
      files: [
        join(tempDir, "json", "jobs.json"),
        join(tempDir, "csv", "jobs.csv"),
      ],
    });
    const saved = await readRecords("jobs");
    expect(saved[0]).toEqual({
      id: 1,
      name: "Backend Engineer",
      job_posts: [{ id: 11, content: "<p>Build</p>" }],
      approval_flows: [],
      openings: [],
      stages: [],
    });
    expect(saved[1].stages).toEqual([]);
    const csv = await readFile(join(tempDir, "csv", "jobs.csv"), "utf-8");
    expect(csv.split("\n")[0]).toBe(
      "approval_flows,id,job_posts,name,openings,stages",
    );
  });

  it("merges offer details over list items", async () => {
    const { client: http } = createTestHttpClient((url) => {
      if (url.pathname === "/v1/offers") {
        return jsonResponse([{ id: 5, status: "unresolved" }]);
      }
      if (url.pathname === "/v1/offers/5") {
        return jsonResponse({ id: 5, status: "accepted", version: 2 });
      }
      return new Response("not found", { status: 404 });
    });
    const client = new GreenhouseClient(http, 100);

    await exportEntity("offers", { client, concurrency: 1 });
    expect(await readRecords("offers")).toEqual([
      { id: 5, status: "accepted", version: 2 },
    ]);
  });

  it("saves metadata endpoints in their own folder and skips failures", async () => {
    const { client: http } = createTestHttpClient((url) => {
      if (url.pathname === "/v1/departments") {
        return jsonResponse([{ id: 1, name: "Engineering" }]);
      }
      if (url.pathname === "/v1/eeoc") {
        return new Response("forbidden", { status: 403 });
      }
      return jsonResponse([]);
    });
    const client = new GreenhouseClient(http, 100);

    const summary = await exportEntity("metadata", { client });
    expect(summary.count).toBe(1);
    expect(summary.files).toContain(
      join(tempDir, "json", "metadata", "departments.json"),
    );
    expect(summary.files).not.toContain(
      join(tempDir, "json", "metadata", "eeoc.json"),
    );
    expect(await readRecords("metadata/departments")).toEqual([
      { id: 1, name: "Engineering" },
    ]);
  });

  it("reports a failing entity and continues with the rest", async () => {
    const { client: http } = createTestHttpClient((url) => {
      if (url.pathname === "/v1/users") {
        return new Response("unauthorized", { status: 401 });
      }
      return jsonResponse([]);
    });
    const client = new GreenhouseClient(http, 100);

    const summaries = await exportAll({ client });
    expect(summaries.map((s) => s.entity)).toEqual([
      "users",
      "jobs",
      "candidates",
      "applications",
      "offers",
      "scorecards",
      "scheduled_interviews",
      "metadata",
      "custom_fields",
    ]);
    expect(summaries[0]).toMatchObject({ status: "failed", count: 0 });
    expect(summaries[0].error).toContain("401");
    expect(summaries.slice(1).every((s) => s.status === "ok")).toBe(true);
  });
});
