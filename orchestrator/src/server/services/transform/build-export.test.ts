import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { saveJson, saveRecords } from "../storage";
import {
  buildTeamtailorExport,
  externalId,
  loadTeamtailorExport,
  scorecardBody,
  transformJob,
  transformUser,
  writeTeamtailorExport,
} from "./index";

const candidate = {
  id: 10,
  first_name: "Ada",
  last_name: "Lovelace",
  email_addresses: [{ value: "ada@example.test", type: "personal" }],
  phone_numbers: [{ value: "+34 600 000 000", type: "mobile" }],
  tags: ["python", " "],
  attachments: [
    {
      filename: "cv.pdf",
      type: "resume",
      url: "https://files.test/cv.pdf",
      created_at: "2024-01-02T00:00:00Z",
    },
  ],
  activity_feed: {
    notes: [
      {
        id: 99,
        body: "Great call",
        created_at: "2024-01-03T00:00:00Z",
        user: { name: "Maria" },
        visiblity: "public",
      },
      { id: 100, body: "" },
    ],
  },
  applications: [{ id: 20, jobs: [{ id: 5 }] }],
};

describe("transformers", () => {
  it("builds external ids from kind prefixes", () => {
    expect(externalId("candidate", "10")).toBe("gh_cand_10");
    expect(externalId("scorecard", "7")).toBe("gh_scorecard_7");
  });

  it("falls back to the first email for users and skips records without id", () => {
    expect(
      transformUser({ id: 2, name: "Juan", emails: ["juan@example.test"] }),
    ).toEqual({
      externalId: "gh_user_2",
      name: "Juan",
      email: "juan@example.test",
      siteAdmin: false,
      disabled: false,
    });
    expect(transformUser({ name: "No id" })).toBeNull();
  });

  it("resolves job location from the first post before offices", () => {
    const job = transformJob({
      id: 5,
      name: "Backend Engineer",
      status: "open",
      offices: [{ name: "Madrid" }],
      job_posts: [{ content: "<p>Build</p>", location: { name: "Remote" } }],
      custom_fields: { work_model: "hybrid" },
      hiring_team: {
        hiring_managers: [{ name: "Maria" }],
        recruiters: [{ name: "Juan" }],
      },
    });
    expect(job).toMatchObject({
      externalId: "gh_job_5",
      title: "Backend Engineer",
      location: "Remote",
      workModel: "hybrid",
      descriptionHtml: "<p>Build</p>",
      hiringTeam: { hiringManagers: ["Maria"], recruiters: ["Juan"] },
    });
    expect(transformJob({ id: 6, offices: [{ name: "Madrid" }] })?.location).toBe(
      "Madrid",
    );
  });

  it("formats scorecards as one body", () => {
    expect(
      scorecardBody({
        interview_step: { name: "Culture" },
        questions: [{ question: "Values", answer: "Aligned" }],
      }),
    ).toBe("Scorecard: Culture (overall: n/a)\n- Values: Aligned");
  });
});

describe("buildTeamtailorExport", () => {
  it("links every entity through external ids", () => {
    const document = buildTeamtailorExport(
      {
        users: [{ id: 1, name: "Maria", primary_email_address: "maria@example.test" }],
        jobs: [{ id: 5, name: "Backend Engineer" }],
        candidates: [candidate],
        interviews: [
          {
            id: 30,
            application_id: 20,
            interview: { name: "Tech" },
            status: "scheduled",
            start: { date_time: "2024-02-01T10:00:00Z" },
            end: { date_time: "2024-02-01T11:00:00Z" },
            organizer: { name: "Maria" },
            interviewers: [
              { name: "Juan", email: "juan@example.test", response_status: "accepted" },
            ],
          },
        ],
        scorecards: [
          {
            id: 40,
            candidate_id: 10,
            application_id: 20,
            interview: "Tech",
            overall_recommendation: "yes",
            submitted_at: "2024-02-02T00:00:00Z",
            submitted_by: { name: "Juan" },
            questions: [{ question: "Skills", answer: "Strong" }],
          },
        ],
        offers: [
          {
            id: 50,
            application_id: 20,
            job_id: 5,
            status: "accepted",
            keyed_custom_fields: {
              link_al_doc_de_proposal: { value: "https://docs.test/p" },
            },
            custom_fields: { salary: "50000" },
          },
        ],
      },
      new Date("2024-03-01T00:00:00Z"),
    );

    expect(document.meta).toEqual({
      generatedAt: "2024-03-01T00:00:00.000Z",
      source: "Greenhouse",
      target: "Teamtailor",
      version: 1,
      counts: {
        users: 1,
        jobs: 1,
        candidates: 1,
        applications: 1,
        notes: 2,
        interviews: 1,
        offers: 1,
      },
    });

    expect(document.candidates[0]).toEqual({
      externalId: "gh_cand_10",
      firstName: "Ada",
      lastName: "Lovelace",
      emails: ["ada@example.test"],
      phones: ["+34 600 000 000"],
      tags: ["python"],
      attachments: [
        {
          filename: "cv.pdf",
          type: "resume",
          sourceUrl: "https://files.test/cv.pdf",
          createdAt: "2024-01-02T00:00:00Z",
        },
      ],
      customFields: {},
    });

    expect(document.applications).toEqual([
      {
        externalId: "gh_app_20",
        candidateExternalId: "gh_cand_10",
        jobExternalId: "gh_job_5",
        appliedAt: null,
        status: null,
        source: null,
        attachments: [],
      },
    ]);

    expect(document.notes).toEqual([
      {
        externalId: "gh_note_99",
        candidateExternalId: "gh_cand_10",
        applicationExternalId: null,
        body: "Great call",
        createdAt: "2024-01-03T00:00:00Z",
        authorName: "Maria",
        visibility: "public",
      },
      {
        externalId: "gh_scorecard_40",
        candidateExternalId: "gh_cand_10",
        applicationExternalId: "gh_app_20",
        body: "Scorecard: Tech (overall: yes)\n- Skills: Strong",
        createdAt: "2024-02-02T00:00:00Z",
        authorName: "Juan",
        visibility: "private",
      },
    ]);

    expect(document.interviews[0]).toMatchObject({
      externalId: "gh_int_30",
      applicationExternalId: "gh_app_20",
      candidateExternalId: "gh_cand_10",
      title: "Tech",
      organizer: "Maria",
      interviewers: [
        { name: "Juan", email: "juan@example.test", responseStatus: "accepted" },
      ],
    });

    expect(document.offers[0]).toMatchObject({
      externalId: "gh_offer_50",
      candidateExternalId: "gh_cand_10",
      jobExternalId: "gh_job_5",
      status: "accepted",
      proposalUrl: "https://docs.test/p",
      customFields: { salary: "50000" },
    });
  });

  it("prefers the applications list over embedded applications", () => {
    const document = buildTeamtailorExport({
      candidates: [candidate],
      applications: [{ id: 21, candidate_id: 10, source: { public_name: "LinkedIn" } }],
    });
    expect(document.applications.map((app) => [app.externalId, app.source])).toEqual([
      ["gh_app_21", "LinkedIn"],
    ]);
  });
});

describe.sequential("teamtailor export files", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "ats-bridge-transform-"));
    process.env.DATA_DIR = tempDir;
  });

  afterEach(async () => {
    delete process.env.DATA_DIR;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("writes the export from raw files and loads it back", async () => {
    await saveRecords("candidates", [candidate]);
    await saveRecords("jobs", [{ id: 5, name: "Backend Engineer" }]);

    const { document, path } = await writeTeamtailorExport();
    expect(path).toBe(join(tempDir, "json", "teamtailor_export.json"));
    expect(document.meta.counts).toMatchObject({
      candidates: 1,
      jobs: 1,
      applications: 1,
      notes: 1,
    });
    expect(await loadTeamtailorExport()).toEqual(document);
  });

  it("returns null before any export and rejects malformed documents", async () => {
    expect(await loadTeamtailorExport()).toBeNull();
    await saveJson("teamtailor_export", { users: "nope" });
    await expect(loadTeamtailorExport()).rejects.toBeInstanceOf(ZodError);
  });
});
