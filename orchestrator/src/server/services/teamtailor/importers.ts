/**
 * Pushes the Teamtailor export into Teamtailor, one entity at a time.
 *
 * A record whose external id is already in the id mapping is skipped. Every
 * other record is resolved against its dependencies (through the mapping,
 * then by external id), written, and its Teamtailor id stored.
 */

import { logger } from "@infra/logger";
import * as idMappings from "@server/repositories/id-mappings";
import { appendMigrationLog } from "@server/repositories/migration-logs";
import { describeError } from "@server/services/http/errors";
import { getCustomFieldMapping } from "@server/services/settings";
import { saveJson } from "@server/services/storage";
import { requireTeamtailorExport } from "@server/services/transform";
import type { ImportOptions } from "@shared/migration-schema";
import type {
  ImportReport,
  MigrationEntity,
  MigrationLogStatus,
  TeamtailorExport,
} from "@shared/types";
import { getTeamtailorClient, type TeamtailorClient } from "./client";
import {
  applicationPayload,
  candidateAttributes,
  commentPayload,
  customFieldValuePayload,
  interviewCommentBody,
  jobAttributes,
  offerCommentBody,
  offerCustomFieldValues,
  type ResourcePayload,
} from "./payloads";
import { buildUsersMap } from "./users-map";

const log = logger.child({ service: "teamtailor-import" });

/** A record could not be linked to a record it depends on. */
export class DependencyError extends Error {
  constructor(readonly code: string) {
    super(code);
    this.name = "DependencyError";
  }
}

export interface RecordResult {
  status: Exclude<MigrationLogStatus, "failed">;
  teamtailorId: string | null;
  note?: string;
}

export interface RecordOutcome {
  entity: MigrationEntity;
  externalId: string;
  status: MigrationLogStatus;
  teamtailorId: string | null;
  error?: string;
}

/**
 * External ids a dry run would have created, per entity. Shared across the
 * entities of one run so later entities resolve them as dependencies.
 */
export type DryRunPlan = Map<MigrationEntity, Set<string>>;

export function createDryRunPlan(): DryRunPlan {
  return new Map();
}

interface ImportContext {
  client: TeamtailorClient;
  dryRun: boolean;
  plan: DryRunPlan;
}

interface ImportTask {
  externalId: string;
  operation: string;
  run: () => Promise<RecordResult>;
}

export interface ImportRunOptions extends ImportOptions {
  client?: TeamtailorClient;
  document?: TeamtailorExport;
  runId?: string | null;
  dryRunPlan?: DryRunPlan;
  sleep?: (ms: number) => Promise<void>;
  isCancelled?: () => boolean;
  onStart?: (recordsTotal: number) => void;
  onRecord?: (outcome: RecordOutcome) => void;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Mapping first, then a lookup by external id. A hit from the lookup is
 * stored so later records resolve locally.
 */
async function resolveId(
  ctx: ImportContext,
  entity: MigrationEntity,
  type: string,
  externalId: string,
): Promise<string | null> {
  const mapped = await idMappings.getMappedId(entity, externalId);
  if (mapped) return mapped;
  if (ctx.dryRun && ctx.plan.get(entity)?.has(externalId)) {
    return `planned:${externalId}`;
  }
  const found = await ctx.client.findIdByExternalId(type, externalId);
  if (found && !ctx.dryRun) {
    await idMappings.saveMapping(entity, externalId, found);
  }
  return found;
}

async function requireId(
  ctx: ImportContext,
  entity: MigrationEntity,
  type: string,
  externalId: string | null,
  code: string,
): Promise<string> {
  const id = externalId ? await resolveId(ctx, entity, type, externalId) : null;
  if (!id) throw new DependencyError(code);
  return id;
}

async function upsertResource(
  ctx: ImportContext,
  type: string,
  externalId: string,
  payload: ResourcePayload,
): Promise<RecordResult> {
  if (ctx.dryRun) return { status: "created", teamtailorId: null };
  const result = await ctx.client.upsert({
    type,
    externalId,
    attributes: payload.attributes,
    relationships: payload.relationships,
  });
  return { status: result.action, teamtailorId: result.id };
}

async function createResource(
  ctx: ImportContext,
  type: string,
  payload: ResourcePayload,
): Promise<RecordResult> {
  if (ctx.dryRun) return { status: "created", teamtailorId: null };
  const resource = await ctx.client.create(
    type,
    payload.attributes,
    payload.relationships,
  );
  return { status: "created", teamtailorId: resource.id };
}

type TaskBuilder = (
  ctx: ImportContext,
  document: TeamtailorExport,
) => Promise<ImportTask[]>;

const TASK_BUILDERS: Record<MigrationEntity, TaskBuilder> = {
  // Users cannot be created through the API; matched users are only linked.
  async users(ctx, document) {
    const { rows } = await buildUsersMap({ client: ctx.client, document });
    return rows.map((row): ImportTask => ({
      externalId: row.ghExternalId,
      operation: "link",
      run: async (): Promise<RecordResult> =>
        row.ttUserId
          ? { status: "updated", teamtailorId: row.ttUserId }
          : { status: "skipped", teamtailorId: null, note: "missing_in_tt" },
    }));
  },

  async jobs(ctx, document) {
    return document.jobs.map((job): ImportTask => ({
      externalId: job.externalId,
      operation: "upsert",
      run: () =>
        upsertResource(ctx, "jobs", job.externalId, {
          attributes: jobAttributes(job),
        }),
    }));
  },

  async candidates(ctx, document) {
    return document.candidates.map((candidate): ImportTask => ({
      externalId: candidate.externalId,
      operation: "upsert",
      run: () =>
        upsertResource(ctx, "candidates", candidate.externalId, {
          attributes: candidateAttributes(candidate),
        }),
    }));
  },

  async applications(ctx, document) {
    return document.applications.map((application): ImportTask => ({
      externalId: application.externalId,
      operation: "upsert",
      run: async () => {
        const candidateId = await requireId(
          ctx,
          "candidates",
          "candidates",
          application.candidateExternalId,
          "candidate_not_found",
        );
        const jobId = application.jobExternalId
          ? await requireId(
              ctx,
              "jobs",
              "jobs",
              application.jobExternalId,
              "job_not_found",
            )
          : null;
        return upsertResource(
          ctx,
          "job-applications",
          application.externalId,
          applicationPayload(application, { candidateId, jobId }),
        );
      },
    }));
  },

  async notes(ctx, document) {
    return document.notes.map((note): ImportTask => ({
      externalId: note.externalId,
      operation: "create",
      run: async () => {
        const candidateId = await requireId(
          ctx,
          "candidates",
          "candidates",
          note.candidateExternalId,
          "candidate_not_found",
        );
        const applicationId = note.applicationExternalId
          ? await resolveId(
              ctx,
              "applications",
              "job-applications",
              note.applicationExternalId,
            )
          : null;
        return createResource(
          ctx,
          "comments",
          commentPayload({
            body: note.body,
            createdAt: note.createdAt,
            visibility: note.visibility,
            authorName: note.authorName,
            candidateId,
            applicationId,
          }),
        );
      },
    }));
  },

  async interviews(ctx, document) {
    return document.interviews.map((interview): ImportTask => ({
      externalId: interview.externalId,
      operation: "create",
      run: async () => {
        const applicationId = await requireId(
          ctx,
          "applications",
          "job-applications",
          interview.applicationExternalId,
          "application_not_found",
        );
        return createResource(
          ctx,
          "comments",
          commentPayload({
            body: interviewCommentBody(interview),
            createdAt: interview.startAt,
            applicationId,
          }),
        );
      },
    }));
  },

  async offers(ctx, document) {
    return document.offers.map((offer): ImportTask => ({
      externalId: offer.externalId,
      operation: "create",
      run: async () => {
        const applicationId = await requireId(
          ctx,
          "applications",
          "job-applications",
          offer.applicationExternalId,
          "application_not_found",
        );
        return createResource(
          ctx,
          "comments",
          commentPayload({
            body: offerCommentBody(offer),
            createdAt: offer.sentAt,
            applicationId,
          }),
        );
      },
    }));
  },

  async custom_field_values(ctx, document) {
    const mapping = await getCustomFieldMapping();
    return document.offers.flatMap((offer) =>
      offerCustomFieldValues(offer, mapping).map((field): ImportTask => ({
        externalId: `${offer.externalId}:${field.key}`,
        operation: "create",
        run: async () => {
          const ownerId = await requireId(
            ctx,
            "applications",
            "job-applications",
            offer.applicationExternalId,
            "application_not_found",
          );
          return createResource(
            ctx,
            "custom-field-values",
            customFieldValuePayload({
              ownerType: "job-applications",
              ownerId,
              customFieldId: field.customFieldId,
              value: field.value,
            }),
          );
        },
      })),
    );
  },
};

function planned(plan: DryRunPlan, entity: MigrationEntity): Set<string> {
  const existing = plan.get(entity);
  if (existing) return existing;
  const created = new Set<string>();
  plan.set(entity, created);
  return created;
}

function emptyReport(entity: MigrationEntity, dryRun: boolean): ImportReport {
  return {
    entity,
    dryRun,
    created: 0,
    updated: 0,
    skipped: 0,
    failed: 0,
    total: 0,
    errors: [],
  };
}

/**
 * Imports one entity from the export document and writes
 * `json/report_<entity>.json`. Record failures are counted, never thrown.
 */
export async function importEntity(
  entity: MigrationEntity,
  options: ImportRunOptions = {},
): Promise<ImportReport> {
  const document = options.document ?? (await requireTeamtailorExport());
  const ctx: ImportContext = {
    client: options.client ?? getTeamtailorClient(),
    dryRun: options.dryRun ?? false,
    plan: options.dryRunPlan ?? createDryRunPlan(),
  };
  const sleep = options.sleep ?? defaultSleep;
  const delayMs = options.delayMs ?? 0;
  const runId = options.runId ?? null;

  let tasks = await TASK_BUILDERS[entity](ctx, document);
  if (options.limit !== undefined) tasks = tasks.slice(0, options.limit);

  const report = emptyReport(entity, ctx.dryRun);
  options.onStart?.(tasks.length);
  log.info("Import started", { entity, records: tasks.length, dryRun: ctx.dryRun });

  for (const [index, task] of tasks.entries()) {
    if (options.isCancelled?.()) {
      log.info("Import cancelled", { entity, processed: report.total });
      break;
    }

    let outcome: RecordOutcome;
    try {
      const mapped = await idMappings.getMappedId(entity, task.externalId);
      const result: RecordResult = mapped
        ? { status: "skipped", teamtailorId: mapped, note: "already_mapped" }
        : await task.run();
      if (!mapped && result.teamtailorId && !ctx.dryRun) {
        await idMappings.saveMapping(entity, task.externalId, result.teamtailorId);
      }
      if (!mapped && ctx.dryRun && result.status === "created") {
        planned(ctx.plan, entity).add(task.externalId);
      }
      report[result.status]++;
      outcome = {
        entity,
        externalId: task.externalId,
        status: result.status,
        teamtailorId: result.teamtailorId,
        error: result.note,
      };
    } catch (error) {
      const message = describeError(error);
      report.failed++;
      report.errors.push({ externalId: task.externalId, error: message });
      log.warn("Record import failed", {
        entity,
        externalId: task.externalId,
        error: message,
      });
      outcome = {
        entity,
        externalId: task.externalId,
        status: "failed",
        teamtailorId: null,
        error: message,
      };
    }
    report.total++;

    if (runId) {
      await appendMigrationLog({
        runId,
        operation: task.operation,
        entityType: entity,
        externalId: task.externalId,
        teamtailorId: outcome.teamtailorId,
        status: outcome.status,
        errorMessage: outcome.error ?? null,
      });
    }
    options.onRecord?.(outcome);

    if (delayMs > 0 && index < tasks.length - 1) await sleep(delayMs);
  }

  await saveJson(`report_${entity}`, report);
  log.info("Import finished", {
    entity,
    created: report.created,
    updated: report.updated,
    skipped: report.skipped,
    failed: report.failed,
  });
  return report;
}
