/**
 * Batch export of Greenhouse entities to DATA_DIR/json and DATA_DIR/csv.
 *
 * Each record may be enriched with sub-resources fetched concurrently. A
 * failing sub-fetch is logged and replaced with an empty value; it never
 * drops the parent record.
 */

import { logger } from "@infra/logger";
import { getConfig } from "@server/config/app-config";
import { saveRecords } from "@server/services/storage";
import { EXPORT_ENTITIES, type ExportEntity, type ExportSummary } from "@shared/types";
import { getString, type UnknownRecord } from "@shared/utils/records";
import { type GreenhouseClient, getGreenhouseClient } from "./client";

const log = logger.child({ service: "greenhouse-export" });

type RecordEntity = Exclude<ExportEntity, "metadata" | "custom_fields">;

interface Enrichment {
  key: string;
  kind: "list" | "record";
  path: (id: string) => string;
}

interface EntityPlan {
  path: string;
  enrich?: Enrichment[];
  detailPath?: (id: string) => string;
}

const ENTITY_PLANS: Record<RecordEntity, EntityPlan> = {
  users: {
    path: "/users",
    enrich: [
      {
        key: "permissions_jobs",
        kind: "list",
        path: (id) => `/users/${id}/permissions/jobs`,
      },
      {
        key: "pending_approvals",
        kind: "list",
        path: (id) => `/users/${id}/pending_approvals`,
      },
    ],
  },
  jobs: {
    path: "/jobs",
    enrich: [
      { key: "job_posts", kind: "list", path: (id) => `/jobs/${id}/job_posts` },
      {
        key: "approval_flows",
        kind: "list",
        path: (id) => `/jobs/${id}/approval_flows`,
      },
      { key: "openings", kind: "list", path: (id) => `/jobs/${id}/openings` },
      { key: "stages", kind: "list", path: (id) => `/jobs/${id}/stages` },
    ],
  },
  candidates: {
    path: "/candidates",
    enrich: [
      {
        key: "activity_feed",
        kind: "record",
        path: (id) => `/candidates/${id}/activity_feed`,
      },
    ],
  },
  applications: {
    path: "/applications",
    enrich: [
      {
        key: "scorecards",
        kind: "list",
        path: (id) => `/applications/${id}/scorecards`,
      },
    ],
  },
  offers: {
    path: "/offers",
    detailPath: (id) => `/offers/${id}`,
  },
  scorecards: { path: "/scorecards" },
  scheduled_interviews: { path: "/scheduled_interviews" },
};

export const METADATA_ENDPOINTS = [
  "close_reasons",
  "rejection_reasons",
  "departments",
  "sources",
  "degrees",
  "eeoc",
  "disciplines",
  "schools",
  "user_roles",
  "email_templates",
  "offices",
  "prospect_pools",
] as const;

export const CUSTOM_FIELD_TYPES = ["candidate", "job", "application"] as const;

export interface ExportOptions {
  client?: GreenhouseClient;
  concurrency?: number;
}

interface ExportContext {
  client: GreenhouseClient;
  concurrency: number;
}

export async function runWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let cursor = 0;
  const workers = Array.from({
    length: Math.max(1, Math.min(concurrency, items.length)),
  }).map(async () => {
    while (cursor < items.length) {
      const index = cursor++;
      await worker(items[index], index);
    }
  });
  await Promise.all(workers);
}

async function fetchEnrichment(
  ctx: ExportContext,
  enrichment: Enrichment,
  id: string,
): Promise<unknown> {
  const path = enrichment.path(id);
  try {
    if (enrichment.kind === "list") return await ctx.client.fetchAll(path);
    return await ctx.client.getRecord(path);
  } catch (error) {
    log.warn("Sub-resource fetch failed, using empty value", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return enrichment.kind === "list" ? [] : null;
  }
}

async function enrichRecords(
  ctx: ExportContext,
  records: UnknownRecord[],
  plan: EntityPlan,
): Promise<UnknownRecord[]> {
  const { enrich = [], detailPath } = plan;
  if (enrich.length === 0 && !detailPath) return records;

  const enriched = [...records];
  await runWithConcurrency(records, ctx.concurrency, async (record, index) => {
    const id = getString(record, "id");
    if (!id) return;

    let next: UnknownRecord = { ...record };
    if (detailPath) {
      try {
        const detail = await ctx.client.getRecord(detailPath(id));
        if (detail) next = { ...next, ...detail };
      } catch (error) {
        log.warn("Detail fetch failed, keeping list item", {
          path: detailPath(id),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    for (const enrichment of enrich) {
      next[enrichment.key] = await fetchEnrichment(ctx, enrichment, id);
    }
    enriched[index] = next;
  });
  return enriched;
}

async function exportRecordEntity(
  ctx: ExportContext,
  entity: RecordEntity,
): Promise<ExportSummary> {
  const plan = ENTITY_PLANS[entity];
  const records = await ctx.client.fetchAll(plan.path);
  log.info("Fetched Greenhouse records", { entity, count: records.length });
  const enriched = await enrichRecords(ctx, records, plan);
  const files = await saveRecords(entity, enriched);
  return { entity, count: enriched.length, files, status: "ok" };
}

async function exportGrouped(
  ctx: ExportContext,
  entity: "metadata" | "custom_fields",
  parts: ReadonlyArray<{ name: string; path: string }>,
): Promise<ExportSummary> {
  let count = 0;
  const files: string[] = [];
  for (const part of parts) {
    try {
      const records = await ctx.client.fetchAll(part.path);
      files.push(...(await saveRecords(`${entity}/${part.name}`, records)));
      count += records.length;
    } catch (error) {
      log.warn("Skipping endpoint after fetch failure", {
        entity,
        endpoint: part.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return { entity, count, files, status: "ok" };
}

function resolveContext(options: ExportOptions): ExportContext {
  return {
    client: options.client ?? getGreenhouseClient(),
    concurrency: options.concurrency ?? getConfig().EXPORT_CONCURRENCY,
  };
}

export async function exportEntity(
  entity: ExportEntity,
  options: ExportOptions = {},
): Promise<ExportSummary> {
  const ctx = resolveContext(options);
  if (entity === "metadata") {
    return exportGrouped(
      ctx,
      entity,
      METADATA_ENDPOINTS.map((name) => ({ name, path: `/${name}` })),
    );
  }
  if (entity === "custom_fields") {
    return exportGrouped(
      ctx,
      entity,
      CUSTOM_FIELD_TYPES.map((type) => ({
        name: type,
        path: `/custom_fields/${type}`,
      })),
    );
  }
  return exportRecordEntity(ctx, entity);
}

/**
 * Exports every entity in dependency order. A failing entity is reported and
 * the remaining ones still run.
 */
export async function exportAll(
  options: ExportOptions & {
    onEntity?: (summary: ExportSummary) => void;
  } = {},
): Promise<ExportSummary[]> {
  const ctx = resolveContext(options);
  const summaries: ExportSummary[] = [];
  for (const entity of EXPORT_ENTITIES) {
    let summary: ExportSummary;
    try {
      summary = await exportEntity(entity, ctx);
    } catch (error) {
      log.error("Entity export failed", { entity, error });
      summary = {
        entity,
        count: 0,
        files: [],
        status: "failed",
        error: error instanceof Error ? error.message : String(error),
      };
    }
    summaries.push(summary);
    options.onEntity?.(summary);
  }
  return summaries;
}
