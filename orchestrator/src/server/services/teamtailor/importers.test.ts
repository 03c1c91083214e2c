import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TeamtailorExport } from "@shared/types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeTeamtailor } from "./test-utils";

function buildDocument(): TeamtailorExport {
  return {
    meta: {
      generatedAt: "2024-03-01T00:00:00.000Z",
      source: "Greenhouse",
      target: "Teamtailor",
      version: 1,
      counts: {},
    },
    users: [
      {
        externalId: "gh_user_1",
        name: "Maria",
        email: "Maria@Example.test",
        siteAdmin: false,
        disabled: false,
      },
      {
        externalId: "gh_user_2",
        name: "Juan",
        email: "juan@example.test",
        siteAdmin: false,
        disabled: false,
      },
    ],
    jobs: [
      {
        externalId: "gh_job_5",
        title: "Backend Engineer",
        status: "open",
        location: null,
        workModel: null,
        descriptionHtml: null,
        openedAt: null,
        closedAt: null,
        hiringTeam: { hiringManagers: [], recruiters: [] },
        customFields: {},
      },
    ],
    candidates: [
      {
        externalId: "gh_cand_10",
        firstName: "Ada",
        lastName: "Lovelace",
        emails: ["ada@example.test"],
        phones: [],
        tags: [],
        attachments: [],
        customFields: {},
      },
      {
        externalId: "gh_cand_11",
        firstName: "Bob",
        lastName: null,
        emails: [],
        phones: [],
        tags: [],
        attachments: [],
        customFields: {},
      },
    ],
    applications: [
      {
        externalId: "gh_app_20",
        candidateExternalId: "gh_cand_10",
        jobExternalId: "gh_job_5",
        appliedAt: "2024-01-05",
        status: "active",
        source: null,
        attachments: [],
      },
      {
        externalId: "gh_app_21",
        candidateExternalId: "gh_cand_99",
        jobExternalId: null,
        appliedAt: null,
        status: null,
        source: null,
        attachments: [],
      },
    ],
    notes: [
      {
        externalId: "gh_note_99",
        candidateExternalId: "gh_cand_10",
        applicationExternalId: null,
        body: "Great call",
        createdAt: null,
        authorName: "Maria",
        visibility: "private",
      },
    ],
    interviews: [
      {
        externalId: "gh_int_30",
        applicationExternalId: "gh_app_20",
        candidateExternalId: "gh_cand_10",
        title: "Tech",
        status: "scheduled",
        startAt: "2024-02-01T10:00:00Z",
        endAt: null,
        videoConferencingUrl: null,
        organizer: null,
        interviewers: [],
      },
    ],
    offers: [
      {
        externalId: "gh_offer_50",
        applicationExternalId: "gh_app_20",
        candidateExternalId: "gh_cand_10",
        jobExternalId: "gh_job_5",
        status: "accepted",
        sentAt: null,
        resolvedAt: null,
        startsAt: null,
        customFields: { salary: "50000" },
        proposalUrl: null,
      },
      {
        externalId: "gh_offer_51",
        applicationExternalId: null,
        candidateExternalId: null,
        jobExternalId: null,
        status: "rejected",
        sentAt: null,
        resolvedAt: null,
        startsAt: null,
        customFields: {},
        proposalUrl: null,
      },
    ],
  };
}

describe.sequential("teamtailor importers", () => {
  let tempDir: string;
  let importers: typeof import("./importers");
  let idMappings: typeof import("../../repositories/id-mappings");

  beforeEach(async () => {
    vi.resetModules();
    tempDir = await mkdtemp(join(tmpdir(), "ats-bridge-import-"));
    process.env.DATA_DIR = tempDir;

    await import("../../db/migrate");
    importers = await import("./importers");
    idMappings = await import("../../repositories/id-mappings");
  });

  afterEach(async () => {
    const { closeDb } = await import("../../db/index");
    closeDb();
    delete process.env.DATA_DIR;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("imports dependencies first and skips mapped records on re-run", async () => {
    const fake = createFakeTeamtailor();
    const document = buildDocument();
    const options = { client: fake.client, document };

    await expect(importers.importEntity("jobs", options)).resolves.toMatchObject({
      created: 1,
      failed: 0,
    });
    await expect(
      importers.importEntity("candidates", options),
    ).resolves.toMatchObject({ created: 2, total: 2 });

    const applications = await importers.importEntity("applications", options);
    expect(applications).toEqual({
      entity: "applications",
      dryRun: false,
      created: 1,
      updated: 0,
      skipped: 0,
      failed: 1,
      total: 2,
      errors: [{ externalId: "gh_app_21", error: "candidate_not_found" }],
    });
    expect(fake.list("job-applications")[0].relationships).toEqual({
      candidate: { data: { type: "candidates", id: "2" } },
      job: { data: { type: "jobs", id: "1" } },
    });

    const { readJson } = await import("../storage");
    expect(await readJson("report_applications")).toEqual(applications);

    await expect(importers.importEntity("notes", options)).resolves.toMatchObject({
      created: 1,
    });
    expect(fake.list("comments")[0]).toMatchObject({
      attributes: { body: "Great call", visibility: "private", "author-name": "Maria" },
      relationships: { candidate: { data: { type: "candidates", id: "2" } } },
    });

    await expect(
      importers.importEntity("candidates", options),
    ).resolves.toMatchObject({ created: 0, skipped: 2 });
    expect(fake.list("candidates")).toHaveLength(2);
  });

  it("updates records that already exist in Teamtailor", async () => {
    const fake = createFakeTeamtailor();
    fake.seed("candidates", { "external-id": "gh_cand_10", "first-name": "Old" });

    const report = await importers.importEntity("candidates", {
      client: fake.client,
      document: buildDocument(),
    });
    expect(report).toMatchObject({ created: 1, updated: 1, failed: 0 });
    expect(fake.list("candidates")[0].attributes["first-name"]).toBe("Ada");
    expect(await idMappings.getMappedId("candidates", "gh_cand_10")).toBe("1");
  });

  it("writes nothing during a dry run", async () => {
    const fake = createFakeTeamtailor();
    const report = await importers.importEntity("jobs", {
      client: fake.client,
      document: buildDocument(),
      dryRun: true,
    });
    expect(report).toMatchObject({ dryRun: true, created: 1, total: 1 });
    expect(fake.fetchImpl).not.toHaveBeenCalled();
    expect(await idMappings.getMappedId("jobs", "gh_job_5")).toBeNull();
  });

  it("resolves records planned earlier in the same dry run", async () => {
    const fake = createFakeTeamtailor();
    const options = {
      client: fake.client,
      document: buildDocument(),
      dryRun: true,
      dryRunPlan: importers.createDryRunPlan(),
    };

    await importers.importEntity("jobs", options);
    await importers.importEntity("candidates", options);
    const applications = await importers.importEntity("applications", options);

    expect(applications).toMatchObject({
      created: 1,
      failed: 1,
      errors: [{ externalId: "gh_app_21", error: "candidate_not_found" }],
    });
    // Only the unplanned candidate of gh_app_21 is looked up.
    expect(fake.fetchImpl).toHaveBeenCalledTimes(1);
    expect(fake.list("job-applications")).toHaveLength(0);
    expect(await idMappings.getMappedId("applications", "gh_app_20")).toBeNull();
  });

  it("attaches interview and offer data to mapped applications", async () => {
    const fake = createFakeTeamtailor();
    const document = buildDocument();
    await idMappings.saveMapping("applications", "gh_app_20", "300");
    const { setSetting } = await import("../../repositories/settings");
    await setSetting(
      "customFieldMapping",
      JSON.stringify({ status: "cf-1", salary: "cf-3" }),
    );

    await expect(
      importers.importEntity("interviews", { client: fake.client, document }),
    ).resolves.toMatchObject({ created: 1, failed: 0 });
    expect(fake.list("comments")[0].relationships).toEqual({
      "job-application": { data: { type: "job-applications", id: "300" } },
    });

    const values = await importers.importEntity("custom_field_values", {
      client: fake.client,
      document,
    });
    expect(values).toMatchObject({
      created: 2,
      failed: 1,
      errors: [{ externalId: "gh_offer_51:status", error: "application_not_found" }],
    });
    expect(
      fake.list("custom-field-values").map((value) => value.attributes.value),
    ).toEqual(["accepted", "50000"]);
  });

  it("links users by email without creating them", async () => {
    const fake = createFakeTeamtailor();
    fake.seed("users", { name: "Maria G", email: "maria@example.test" });

    const report = await importers.importEntity("users", {
      client: fake.client,
      document: buildDocument(),
    });
    expect(report).toMatchObject({ updated: 1, skipped: 1, created: 0 });
    expect(await idMappings.getMappedId("users", "gh_user_1")).toBe("1");
    expect(fake.list("users")).toHaveLength(1);

    const { readRecords } = await import("../storage");
    expect(
      (await readRecords("users_map")).map((row) => [row.ghExternalId, row.status]),
    ).toEqual([
      ["gh_user_1", "matched"],
      ["gh_user_2", "missing_in_tt"],
    ]);
  });

  it("logs each record of a run, waits between records and stops when cancelled", async () => {
    const fake = createFakeTeamtailor();
    const { startMigrationRun } = await import("../../repositories/migration-runs");
    const { listMigrationLogs } = await import("../../repositories/migration-logs");
    const run = await startMigrationRun({ dryRun: false, entities: ["candidates"] });
    const sleep = vi.fn(async (_ms: number) => {});
    const outcomes: string[] = [];

    await importers.importEntity("candidates", {
      client: fake.client,
      document: buildDocument(),
      runId: run.id,
      delayMs: 50,
      sleep,
      onRecord: (outcome) => outcomes.push(`${outcome.externalId}:${outcome.status}`),
    });
    expect(sleep.mock.calls).toEqual([[50]]);
    expect(outcomes).toEqual(["gh_cand_10:created", "gh_cand_11:created"]);
    expect(
      (await listMigrationLogs(run.id)).map((entry) => [entry.operation, entry.status]),
    ).toEqual([
      ["upsert", "created"],
      ["upsert", "created"],
    ]);

    const cancelled = await importers.importEntity("jobs", {
      client: fake.client,
      document: buildDocument(),
      isCancelled: () => true,
    });
    expect(cancelled.total).toBe(0);
  });
});
