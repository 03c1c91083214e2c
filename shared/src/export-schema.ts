import { z } from "zod";
import type {
  ExportApplication,
  ExportAttachment,
  ExportCandidate,
  ExportInterview,
  ExportJob,
  ExportNote,
  ExportOffer,
  ExportUser,
  TeamtailorExport,
} from "./types";

const nullableString = z.string().nullable();
const customFields = z.record(z.unknown());

const attachmentSchema: z.ZodType<ExportAttachment> = z.object({
  filename: nullableString,
  type: nullableString,
  sourceUrl: nullableString,
  createdAt: nullableString,
});

const userSchema: z.ZodType<ExportUser> = z.object({
  externalId: z.string(),
  name: nullableString,
  email: nullableString,
  siteAdmin: z.boolean(),
  disabled: z.boolean(),
});

const jobSchema: z.ZodType<ExportJob> = z.object({
  externalId: z.string(),
  title: z.string(),
  status: nullableString,
  location: nullableString,
  workModel: nullableString,
  descriptionHtml: nullableString,
  openedAt: nullableString,
  closedAt: nullableString,
  hiringTeam: z.object({
    hiringManagers: z.array(z.string()),
    recruiters: z.array(z.string()),
  }),
  customFields,
});

const candidateSchema: z.ZodType<ExportCandidate> = z.object({
  externalId: z.string(),
  firstName: nullableString,
  lastName: nullableString,
  emails: z.array(z.string()),
  phones: z.array(z.string()),
  tags: z.array(z.string()),
  attachments: z.array(attachmentSchema),
  customFields,
});

const applicationSchema: z.ZodType<ExportApplication> = z.object({
  externalId: z.string(),
  candidateExternalId: z.string(),
  jobExternalId: nullableString,
  appliedAt: nullableString,
  status: nullableString,
  source: nullableString,
  attachments: z.array(attachmentSchema),
});

const noteSchema: z.ZodType<ExportNote> = z.object({
  externalId: z.string(),
  candidateExternalId: z.string(),
  applicationExternalId: nullableString,
  body: z.string(),
  createdAt: nullableString,
  authorName: nullableString,
  visibility: z.enum(["private", "public"]),
});

const interviewSchema: z.ZodType<ExportInterview> = z.object({
  externalId: z.string(),
  applicationExternalId: nullableString,
  candidateExternalId: nullableString,
  title: nullableString,
  status: nullableString,
  startAt: nullableString,
  endAt: nullableString,
  videoConferencingUrl: nullableString,
  organizer: nullableString,
  interviewers: z.array(
    z.object({
      name: nullableString,
      email: nullableString,
      responseStatus: nullableString,
    }),
  ),
});

const offerSchema: z.ZodType<ExportOffer> = z.object({
  externalId: z.string(),
  applicationExternalId: nullableString,
  candidateExternalId: nullableString,
  jobExternalId: nullableString,
  status: nullableString,
  sentAt: nullableString,
  resolvedAt: nullableString,
  startsAt: nullableString,
  customFields,
  proposalUrl: nullableString,
});

/** Validates a Teamtailor export document read back from disk. */
export const teamtailorExportSchema: z.ZodType<TeamtailorExport> = z.object({
  meta: z.object({
    generatedAt: z.string(),
    source: z.literal("Greenhouse"),
    target: z.literal("Teamtailor"),
    version: z.literal(1),
    counts: z.record(z.number()),
  }),
  users: z.array(userSchema),
  jobs: z.array(jobSchema),
  candidates: z.array(candidateSchema),
  applications: z.array(applicationSchema),
  notes: z.array(noteSchema),
  interviews: z.array(interviewSchema),
  offers: z.array(offerSchema),
});
