/**
 * Turns raw Greenhouse exports into a single Teamtailor-shaped document.
 *
 * Every record gets a deterministic external id (`gh_<kind>_<greenhouseId>`).
 * Importers use it as the idempotency key on the Teamtailor side.
 */

import type {
  ExportApplication,
  ExportAttachment,
  ExportCandidate,
  ExportInterview,
  ExportJob,
  ExportNote,
  ExportOffer,
  ExportUser,
  NoteVisibility,
  TeamtailorExport,
} from "@shared/types";
import {
  getArray,
  getBoolean,
  getPath,
  getRecord,
  getRecords,
  getString,
  isRecord,
  toStringOrNull,
  type UnknownRecord,
} from "@shared/utils/records";

export const EXTERNAL_ID_PREFIX = {
  user: "gh_user_",
  job: "gh_job_",
  candidate: "gh_cand_",
  application: "gh_app_",
  note: "gh_note_",
  interview: "gh_int_",
  offer: "gh_offer_",
  scorecard: "gh_scorecard_",
} as const;

export type ExternalIdKind = keyof typeof EXTERNAL_ID_PREFIX;

export function externalId(kind: ExternalIdKind, id: string): string {
  return `${EXTERNAL_ID_PREFIX[kind]}${id}`;
}

function optionalExternalId(
  kind: ExternalIdKind,
  id: string | null,
): string | null {
  return id ? externalId(kind, id) : null;
}

const PROPOSAL_FIELD_KEYS = ["proposal_url", "link_al_doc_de_proposal"];

export interface GreenhouseSource {
  users?: UnknownRecord[];
  jobs?: UnknownRecord[];
  candidates?: UnknownRecord[];
  applications?: UnknownRecord[];
  offers?: UnknownRecord[];
  interviews?: UnknownRecord[];
  scorecards?: UnknownRecord[];
}

/** Greenhouse contact lists hold either strings or `{ value, type }` items. */
function contactValues(values: unknown[]): string[] {
  return values
    .map((item) =>
      isRecord(item)
        ? (getString(item, "value") ?? getString(item, "email"))
        : toStringOrNull(item),
    )
    .filter((value): value is string => value !== null);
}

function stringList(values: unknown[]): string[] {
  return values
    .map((value) => toStringOrNull(value))
    .filter((value): value is string => value !== null);
}

function names(records: UnknownRecord[]): string[] {
  return records
    .map((record) => getString(record, "name"))
    .filter((name): name is string => name !== null);
}

function attachments(record: UnknownRecord): ExportAttachment[] {
  return getRecords(record, "attachments").map((attachment) => ({
    filename: getString(attachment, "filename"),
    type: getString(attachment, "type"),
    sourceUrl: getString(attachment, "url"),
    createdAt: getString(attachment, "created_at"),
  }));
}

export function normalizeVisibility(value: string | null): NoteVisibility {
  return value === "public" ? "public" : "private";
}

export function transformUser(user: UnknownRecord): ExportUser | null {
  const id = getString(user, "id");
  if (!id) return null;
  return {
    externalId: externalId("user", id),
    name: getString(user, "name"),
    email:
      getString(user, "primary_email_address") ??
      contactValues(getArray(user, "emails"))[0] ??
      null,
    siteAdmin: getBoolean(user, "site_admin"),
    disabled: getBoolean(user, "disabled"),
  };
}

export function transformJob(job: UnknownRecord): ExportJob | null {
  const id = getString(job, "id");
  if (!id) return null;
  const post = getRecords(job, "job_posts")[0];
  const customFields = getRecord(job, "custom_fields") ?? {};
  const hiringTeam = getRecord(job, "hiring_team");
  return {
    externalId: externalId("job", id),
    title: getString(job, "name") ?? getString(job, "title") ?? `Job ${id}`,
    status: getString(job, "status"),
    location:
      getString(customFields, "location") ??
      getPath(post, ["location", "name"]) ??
      getString(getRecords(job, "offices")[0], "name"),
    workModel: getString(customFields, "work_model"),
    descriptionHtml: getString(post, "content"),
    openedAt: getString(job, "opened_at"),
    closedAt: getString(job, "closed_at"),
    hiringTeam: {
      hiringManagers: names(getRecords(hiringTeam, "hiring_managers")),
      recruiters: names(getRecords(hiringTeam, "recruiters")),
    },
    customFields,
  };
}

export function transformCandidate(candidate: UnknownRecord): ExportCandidate | null {
  const id = getString(candidate, "id");
  if (!id) return null;
  return {
    externalId: externalId("candidate", id),
    firstName: getString(candidate, "first_name"),
    lastName: getString(candidate, "last_name"),
    emails: contactValues(getArray(candidate, "email_addresses")),
    phones: contactValues(getArray(candidate, "phone_numbers")),
    tags: stringList(getArray(candidate, "tags")),
    attachments: attachments(candidate),
    customFields: getRecord(candidate, "custom_fields") ?? {},
  };
}

export function activityNotes(candidate: UnknownRecord): ExportNote[] {
  const candidateId = getString(candidate, "id");
  if (!candidateId) return [];
  const notes: ExportNote[] = [];
  for (const note of getRecords(getRecord(candidate, "activity_feed"), "notes")) {
    const id = getString(note, "id");
    const body = getString(note, "body");
    if (!id || !body) continue;
    notes.push({
      externalId: externalId("note", id),
      candidateExternalId: externalId("candidate", candidateId),
      applicationExternalId: null,
      body,
      createdAt: getString(note, "created_at"),
      authorName: getPath(note, ["user", "name"]),
      // Harvest spells this field "visiblity" on notes.
      visibility: normalizeVisibility(
        getString(note, "visibility") ?? getString(note, "visiblity"),
      ),
    });
  }
  return notes;
}

export function transformApplication(
  application: UnknownRecord,
  fallbackCandidateId: string | null = null,
): ExportApplication | null {
  const id = getString(application, "id");
  const candidateId = getString(application, "candidate_id") ?? fallbackCandidateId;
  if (!id || !candidateId) return null;
  const jobId = getString(getRecords(application, "jobs")[0], "id");
  return {
    externalId: externalId("application", id),
    candidateExternalId: externalId("candidate", candidateId),
    jobExternalId: optionalExternalId("job", jobId),
    appliedAt: getString(application, "applied_at"),
    status: getString(application, "status"),
    source: getPath(application, ["source", "public_name"]),
    attachments: attachments(application),
  };
}

export function transformInterview(
  interview: UnknownRecord,
  candidateByApplication: Map<string, string>,
): ExportInterview | null {
  const id = getString(interview, "id");
  if (!id) return null;
  const applicationExternalId = optionalExternalId(
    "application",
    getString(interview, "application_id"),
  );
  return {
    externalId: externalId("interview", id),
    applicationExternalId,
    candidateExternalId: applicationExternalId
      ? (candidateByApplication.get(applicationExternalId) ?? null)
      : null,
    title: getPath(interview, ["interview", "name"]),
    status: getString(interview, "status"),
    startAt: getPath(interview, ["start", "date_time"]),
    endAt: getPath(interview, ["end", "date_time"]),
    videoConferencingUrl: getString(interview, "video_conferencing_url"),
    organizer: getPath(interview, ["organizer", "name"]),
    interviewers: getRecords(interview, "interviewers").map((interviewer) => ({
      name: getString(interviewer, "name"),
      email: getString(interviewer, "email"),
      responseStatus: getString(interviewer, "response_status"),
    })),
  };
}

export function scorecardBody(scorecard: UnknownRecord): string {
  const title =
    getString(scorecard, "interview") ??
    getPath(scorecard, ["interview_step", "name"]) ??
    "Interview";
  const overall = getString(scorecard, "overall_recommendation") ?? "n/a";
  const lines = getRecords(scorecard, "questions").map(
    (question) =>
      `- ${getString(question, "question") ?? ""}: ${getString(question, "answer") ?? ""}`,
  );
  return [`Scorecard: ${title} (overall: ${overall})`, ...lines].join("\n");
}

export function transformScorecard(scorecard: UnknownRecord): ExportNote | null {
  const id = getString(scorecard, "id");
  const candidateId = getString(scorecard, "candidate_id");
  if (!id || !candidateId) return null;
  return {
    externalId: externalId("scorecard", id),
    candidateExternalId: externalId("candidate", candidateId),
    applicationExternalId: optionalExternalId(
      "application",
      getString(scorecard, "application_id"),
    ),
    body: scorecardBody(scorecard),
    createdAt:
      getString(scorecard, "submitted_at") ?? getString(scorecard, "created_at"),
    authorName:
      getPath(scorecard, ["submitted_by", "name"]) ??
      getPath(scorecard, ["interviewer", "name"]),
    visibility: "private",
  };
}

function proposalUrl(offer: UnknownRecord): string | null {
  const keyed = getRecord(offer, "keyed_custom_fields");
  const custom = getRecord(offer, "custom_fields");
  for (const key of PROPOSAL_FIELD_KEYS) {
    const value = getPath(keyed, [key, "value"]) ?? getString(custom, key);
    if (value) return value;
  }
  return null;
}

export function transformOffer(
  offer: UnknownRecord,
  candidateByApplication: Map<string, string>,
): ExportOffer | null {
  const id = getString(offer, "id");
  if (!id) return null;
  const applicationExternalId = optionalExternalId(
    "application",
    getString(offer, "application_id"),
  );
  return {
    externalId: externalId("offer", id),
    applicationExternalId,
    candidateExternalId:
      optionalExternalId("candidate", getString(offer, "candidate_id")) ??
      (applicationExternalId
        ? (candidateByApplication.get(applicationExternalId) ?? null)
        : null),
    jobExternalId: optionalExternalId("job", getString(offer, "job_id")),
    status: getString(offer, "status"),
    sentAt: getString(offer, "sent_at"),
    resolvedAt: getString(offer, "resolved_at"),
    startsAt: getString(offer, "starts_at"),
    customFields: getRecord(offer, "custom_fields") ?? {},
    proposalUrl: proposalUrl(offer),
  };
}

function collect<I, O>(items: I[], map: (item: I) => O | null): O[] {
  const out: O[] = [];
  for (const item of items) {
    const mapped = map(item);
    if (mapped !== null) out.push(mapped);
  }
  return out;
}

export function buildTeamtailorExport(
  source: GreenhouseSource,
  now: Date = new Date(),
): TeamtailorExport {
  const candidates = source.candidates ?? [];

  let applications = collect(source.applications ?? [], (application) =>
    transformApplication(application),
  );
  if (applications.length === 0) {
    applications = candidates.flatMap((candidate) =>
      collect(getRecords(candidate, "applications"), (application) =>
        transformApplication(application, getString(candidate, "id")),
      ),
    );
  }

  const candidateByApplication = new Map(
    applications.map((app): [string, string] => [
      app.externalId,
      app.candidateExternalId,
    ]),
  );

  const notes = [
    ...candidates.flatMap(activityNotes),
    ...collect(source.scorecards ?? [], transformScorecard),
  ];

  const document: Omit<TeamtailorExport, "meta"> = {
    users: collect(source.users ?? [], transformUser),
    jobs: collect(source.jobs ?? [], transformJob),
    candidates: collect(candidates, transformCandidate),
    applications,
    notes,
    interviews: collect(source.interviews ?? [], (interview) =>
      transformInterview(interview, candidateByApplication),
    ),
    offers: collect(source.offers ?? [], (offer) =>
      transformOffer(offer, candidateByApplication),
    ),
  };

  return {
    meta: {
      generatedAt: now.toISOString(),
      source: "Greenhouse",
      target: "Teamtailor",
      version: 1,
      counts: {
        users: document.users.length,
        jobs: document.jobs.length,
        candidates: document.candidates.length,
        applications: document.applications.length,
        notes: document.notes.length,
        interviews: document.interviews.length,
        offers: document.offers.length,
      },
    },
    ...document,
  };
}
