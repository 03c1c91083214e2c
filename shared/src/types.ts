/**
 * Shared types for the ATS bridge API and migration pipeline.
 */

export const EXPORT_ENTITIES = [
  "users",
  "jobs",
  "candidates",
  "applications",
  "offers",
  "scorecards",
  "scheduled_interviews",
  "metadata",
  "custom_fields",
] as const;

export type ExportEntity = (typeof EXPORT_ENTITIES)[number];

export const MIGRATION_ENTITIES = [
  "users",
  "jobs",
  "candidates",
  "applications",
  "notes",
  "interviews",
  "offers",
  "custom_field_values",
] as const;

export type MigrationEntity = (typeof MIGRATION_ENTITIES)[number];

export interface ExportSummary {
  entity: string;
  count: number;
  files: string[];
  status: "ok" | "failed";
  error?: string;
}

// ---------------------------------------------------------------------------
// Teamtailor-shaped export document
// ---------------------------------------------------------------------------

export interface ExportUser {
  externalId: string;
  name: string | null;
  email: string | null;
  siteAdmin: boolean;
  disabled: boolean;
}

export interface ExportJob {
  externalId: string;
  title: string;
  status: string | null;
  location: string | null;
  workModel: string | null;
  descriptionHtml: string | null;
  openedAt: string | null;
  closedAt: string | null;
  hiringTeam: { hiringManagers: string[]; recruiters: string[] };
  customFields: Record<string, unknown>;
}

export interface ExportAttachment {
  filename: string | null;
  type: string | null;
  sourceUrl: string | null;
  createdAt: string | null;
}

export interface ExportCandidate {
  externalId: string;
  firstName: string | null;
  lastName: string | null;
  emails: string[];
  phones: string[];
  tags: string[];
  attachments: ExportAttachment[];
  customFields: Record<string, unknown>;
}

export interface ExportApplication {
  externalId: string;
  candidateExternalId: string;
  jobExternalId: string | null;
  appliedAt: string | null;
  status: string | null;
  source: string | null;
  attachments: ExportAttachment[];
}

export type NoteVisibility = "private" | "public";

export interface ExportNote {
  externalId: string;
  candidateExternalId: string;
  applicationExternalId: string | null;
  body: string;
  createdAt: string | null;
  authorName: string | null;
  visibility: NoteVisibility;
}

export interface ExportInterviewer {
  name: string | null;
  email: string | null;
  responseStatus: string | null;
}

export interface ExportInterview {
  externalId: string;
  applicationExternalId: string | null;
  candidateExternalId: string | null;
  title: string | null;
  status: string | null;
  startAt: string | null;
  endAt: string | null;
  videoConferencingUrl: string | null;
  organizer: string | null;
  interviewers: ExportInterviewer[];
}

export interface ExportOffer {
  externalId: string;
  applicationExternalId: string | null;
  candidateExternalId: string | null;
  jobExternalId: string | null;
  status: string | null;
  sentAt: string | null;
  resolvedAt: string | null;
  startsAt: string | null;
  customFields: Record<string, unknown>;
  proposalUrl: string | null;
}

export interface TeamtailorExport {
  meta: {
    generatedAt: string;
    source: "Greenhouse";
    target: "Teamtailor";
    version: 1;
    counts: Record<string, number>;
  };
  users: ExportUser[];
  jobs: ExportJob[];
  candidates: ExportCandidate[];
  applications: ExportApplication[];
  notes: ExportNote[];
  interviews: ExportInterview[];
  offers: ExportOffer[];
}

// ---------------------------------------------------------------------------
// Import and migration
// ---------------------------------------------------------------------------

export interface ImportError {
  externalId: string;
  error: string;
}

export interface ImportReport {
  entity: MigrationEntity;
  dryRun: boolean;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  total: number;
  errors: ImportError[];
}

export type MigrationRunStatus = "running" | "completed" | "failed" | "cancelled";

export interface MigrationRun {
  id: string;
  startedAt: string;
  completedAt: string | null;
  status: MigrationRunStatus;
  dryRun: boolean;
  entities: MigrationEntity[];
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  errorMessage: string | null;
}

export type MigrationLogStatus = "created" | "updated" | "skipped" | "failed";

export interface MigrationLog {
  id: number;
  runId: string | null;
  operation: string;
  entityType: string;
  externalId: string;
  teamtailorId: string | null;
  status: MigrationLogStatus;
  errorMessage: string | null;
  createdAt: string;
}

export type MigrationStep =
  | "idle"
  | "exporting"
  | "transforming"
  | "importing"
  | "completed"
  | "cancelled"
  | "failed";

export interface MigrationProgress {
  step: MigrationStep;
  message: string;
  runId?: string;
  currentEntity?: MigrationEntity;
  entitiesTotal: number;
  entitiesDone: number;
  recordsProcessed: number;
  recordsTotal: number;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  error?: string;
  startedAt?: string;
  completedAt?: string;
}

export interface MigrationStatusResponse {
  isRunning: boolean;
  lastRun: MigrationRun | null;
  progress: MigrationProgress;
}

// ---------------------------------------------------------------------------
// Users map, stats and analytics
// ---------------------------------------------------------------------------

export type UsersMapStatus = "matched" | "missing_in_tt";

export interface UsersMapRow {
  ghExternalId: string;
  ghName: string | null;
  ghEmail: string | null;
  ttUserId: string | null;
  ttName: string | null;
  ttEmail: string | null;
  status: UsersMapStatus;
}

export interface UsersMapResult {
  rows: UsersMapRow[];
  totals: { total: number; matched: number; missing: number };
  files: string[];
}

export interface ExportStats {
  counts: Record<string, number | string>;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface TeamtailorAnalytics {
  totalCandidates: number;
  topTags: TagCount[];
  tagDistribution: Record<string, number>;
  tagCategories: Record<string, { count: number; percentage: number }>;
  maxCandidates: number;
}

export interface AvailableTags {
  tags: string[];
  total: number;
}

export interface CandidateTags {
  candidateId: string;
  candidateName: string | null;
  email: string | null;
  tags: string[];
}

export interface TagUpdateResult {
  success: number;
  failed: number;
  total: number;
  errors: string[];
}

export interface ProspectPool {
  id: string;
  name: string | null;
  description: string | null;
  color: string | null;
  candidateCount: number;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface ProspectPoolList {
  pools: ProspectPool[];
  total: number;
}

export interface PoolCandidate {
  id: string;
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  phone: string | null;
  linkedinUrl: string | null;
  tags: string[];
  createdAt: string | null;
}

export interface PoolCandidatePage {
  poolId: string;
  candidates: PoolCandidate[];
  total: number;
  page: number;
  perPage: number;
}

export interface PoolMembership {
  id: string;
  poolId: string;
  candidateId: string;
}

export interface BulkPoolResult {
  added: number;
  failed: number;
  errors: { candidateId: string; error: string }[];
}

export interface ProspectPoolStats {
  poolId: string;
  poolName: string | null;
  totalCandidates: number;
  withEmail: number;
  withPhone: number;
  withLinkedin: number;
  emailCompletionRate: number;
  phoneCompletionRate: number;
  linkedinCompletionRate: number;
  topTags: TagCount[];
}

export interface ProspectMigrationReport {
  poolId: string | null;
  poolName: string;
  poolCreated: boolean;
  dryRun: boolean;
  processed: number;
  added: number;
  skipped: number;
  failed: number;
  errors: ImportError[];
}

export type CustomFieldMapping = Partial<
  Record<
    "status" | "sent_at" | "resolved_at" | "starts_at" | "salary" | "proposal_url",
    string
  >
>;

export interface AppSettings {
  customFieldMapping: CustomFieldMapping;
  migrationWebhookUrl: string | null;
  defaultMigrationWebhookUrl: string | null;
}

// ---------------------------------------------------------------------------
// API envelope
// ---------------------------------------------------------------------------

export interface ApiMeta {
  requestId: string;
}

export interface ApiErrorPayload {
  code: string;
  message: string;
  details?: unknown;
}

export type ApiResponse<T> =
  | {
      ok: true;
      data: T;
      meta?: ApiMeta;
    }
  | {
      ok: false;
      error: ApiErrorPayload;
      meta: ApiMeta;
    };
