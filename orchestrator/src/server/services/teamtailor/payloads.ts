/**
 * Builders for Teamtailor JSON:API attributes and relationships.
 */

import type {
  CustomFieldMapping,
  ExportApplication,
  ExportCandidate,
  ExportInterview,
  ExportJob,
  ExportOffer,
  NoteVisibility,
} from "@shared/types";
import { compact, getString, isRecord, toStringOrNull } from "@shared/utils/records";
import { type Relationships, relationship } from "./client";

export interface ResourcePayload {
  attributes: Record<string, unknown>;
  relationships?: Relationships;
}

const NOT_AVAILABLE = "N/A";

const JOB_STATUS: Record<string, string> = {
  open: "open",
  draft: "draft",
  closed: "archived",
};

export function jobAttributes(job: ExportJob): Record<string, unknown> {
  return compact({
    title: job.title,
    status: job.status ? (JOB_STATUS[job.status] ?? job.status) : null,
    "external-id": job.externalId,
    location: job.location,
    "work-model": job.workModel,
    body: job.descriptionHtml,
    "opened-at": job.openedAt,
    "closed-at": job.closedAt,
  });
}

/** First contact value; items are strings or `{ value }` / `{ email }` objects. */
export function firstContact(values: unknown[], key: "email" | "phone"): string | null {
  const first = values[0];
  if (isRecord(first)) return getString(first, key) ?? getString(first, "value");
  return toStringOrNull(first);
}

export function candidateAttributes(candidate: ExportCandidate): Record<string, unknown> {
  return compact({
    "first-name": candidate.firstName,
    "last-name": candidate.lastName,
    "external-id": candidate.externalId,
    tags: candidate.tags,
    email: firstContact(candidate.emails, "email"),
    phone: firstContact(candidate.phones, "phone"),
  });
}

export function applicationPayload(
  application: ExportApplication,
  ids: { candidateId: string; jobId: string | null },
): ResourcePayload {
  const relationships: Relationships = {
    candidate: relationship("candidates", ids.candidateId),
  };
  if (ids.jobId) relationships.job = relationship("jobs", ids.jobId);
  return {
    attributes: compact({
      "applied-at": application.appliedAt,
      source: application.source,
      "external-id": application.externalId,
    }),
    relationships,
  };
}

export interface CommentInput {
  body: string;
  createdAt?: string | null;
  visibility?: NoteVisibility | string | null;
  authorName?: string | null;
  candidateId?: string | null;
  applicationId?: string | null;
}

export function commentPayload(input: CommentInput): ResourcePayload {
  const relationships: Relationships = {};
  if (input.candidateId) {
    relationships.candidate = relationship("candidates", input.candidateId);
  }
  if (input.applicationId) {
    relationships["job-application"] = relationship(
      "job-applications",
      input.applicationId,
    );
  }
  const visibility =
    input.visibility === "private" || input.visibility === "public"
      ? input.visibility
      : null;
  return {
    attributes: compact({
      body: input.body,
      "created-at": input.createdAt,
      visibility,
      "author-name": input.authorName || null,
    }),
    relationships,
  };
}

export function interviewCommentBody(interview: ExportInterview): string {
  const lines = [
    `Interview: ${interview.title ?? NOT_AVAILABLE}`,
    `Status: ${interview.status ?? NOT_AVAILABLE}`,
    `Start: ${interview.startAt ?? NOT_AVAILABLE}`,
    `End: ${interview.endAt ?? NOT_AVAILABLE}`,
    `Organizer: ${interview.organizer ?? NOT_AVAILABLE}`,
  ];
  if (interview.videoConferencingUrl) {
    lines.push(`Video: ${interview.videoConferencingUrl}`);
  }
  const interviewers = interview.interviewers
    .map((person) => {
      const name = person.name ?? person.email;
      if (!name) return null;
      return person.responseStatus ? `${name} (${person.responseStatus})` : name;
    })
    .filter((name): name is string => name !== null);
  if (interviewers.length > 0) {
    lines.push(`Interviewers: ${interviewers.join(", ")}`);
  }
  return lines.join("\n");
}

export function offerSalary(offer: ExportOffer): string | null {
  return (
    getString(offer.customFields, "salary") ?? getString(offer.customFields, "salario")
  );
}

export function offerCommentBody(offer: ExportOffer): string {
  const lines = [
    `Offer status: ${offer.status ?? NOT_AVAILABLE}`,
    `Sent at: ${offer.sentAt ?? NOT_AVAILABLE}`,
    `Resolved at: ${offer.resolvedAt ?? NOT_AVAILABLE}`,
    `Starts at: ${offer.startsAt ?? NOT_AVAILABLE}`,
  ];
  const salary = offerSalary(offer);
  if (salary) lines.push(`Salary: ${salary}`);
  if (offer.proposalUrl) lines.push(`Proposal: ${offer.proposalUrl}`);
  return lines.join("\n");
}

export function customFieldValuePayload(input: {
  ownerType: "candidates" | "job-applications";
  ownerId: string;
  customFieldId: string;
  value: unknown;
}): ResourcePayload {
  return {
    attributes: { value: input.value },
    relationships: {
      "custom-field": relationship("custom-fields", input.customFieldId),
      owner: relationship(input.ownerType, input.ownerId),
    },
  };
}

export interface OfferFieldValue {
  key: keyof CustomFieldMapping;
  customFieldId: string;
  value: string;
}

export const OFFER_FIELD_KEYS: ReadonlyArray<keyof CustomFieldMapping> = [
  "status",
  "sent_at",
  "resolved_at",
  "starts_at",
  "salary",
  "proposal_url",
];

/** Offer values that have both a mapped custom field and a non-empty value. */
export function offerCustomFieldValues(
  offer: ExportOffer,
  mapping: CustomFieldMapping,
): OfferFieldValue[] {
  const values: Record<keyof CustomFieldMapping, string | null> = {
    status: offer.status,
    sent_at: offer.sentAt,
    resolved_at: offer.resolvedAt,
    starts_at: offer.startsAt,
    salary: offerSalary(offer),
    proposal_url: offer.proposalUrl,
  };
  const out: OfferFieldValue[] = [];
  for (const key of OFFER_FIELD_KEYS) {
    const customFieldId = mapping[key];
    const value = values[key];
    if (!customFieldId || !value) continue;
    out.push({ key, customFieldId, value });
  }
  return out;
}
