/**
 * Migration run orchestration.
 *
 * Flow:
 * 1. Optionally export from Greenhouse and rebuild the Teamtailor export
 * 2. Import each requested entity in dependency order
 * 3. Record the run, its per-record logs, and notify the webhook
 */

import { conflict } from "@infra/errors";
import { logger } from "@infra/logger";
import { runWithRequestContext } from "@infra/request-context";
import * as migrationRunsRepo from "@server/repositories/migration-runs";
import { exportAll } from "@server/services/greenhouse/export";
import type { GreenhouseClient } from "@server/services/greenhouse/client";
import { describeError } from "@server/services/http/errors";
import type { TeamtailorClient } from "@server/services/teamtailor/client";
import {
  createDryRunPlan,
  importEntity,
} from "@server/services/teamtailor/importers";
import {
  requireTeamtailorExport,
  writeTeamtailorExport,
} from "@server/services/transform";
import type { RunMigrationInput } from "@shared/migration-schema";
import type {
  ExportSummary,
  ImportReport,
  MigrationEntity,
  MigrationRun,
  MigrationRunStatus,
  TeamtailorExport,
} from "@shared/types";
import { resolveMigrationOrder } from "./dependencies";
import { progressHelpers, resetProgress } from "./progress";
import { notifyMigrationWebhookStep } from "./steps/notify-webhook";

export interface RunMigrationOptions extends RunMigrationInput {
  teamtailorClient?: TeamtailorClient;
  greenhouseClient?: GreenhouseClient;
  document?: TeamtailorExport;
  sleep?: (ms: number) => Promise<void>;
}

export interface MigrationResult {
  runId: string;
  status: MigrationRunStatus;
  dryRun: boolean;
  entities: MigrationEntity[];
  exports: ExportSummary[];
  reports: ImportReport[];
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  error?: string;
}

interface ActiveRun {
  id: string;
  cancelRequested: boolean;
}

let activeRun: ActiveRun | null = null;

export function getMigrationStatus(): { isRunning: boolean; runId: string | null } {
  return { isRunning: activeRun !== null, runId: activeRun?.id || null };
}

export function requestMigrationCancel(): {
  accepted: boolean;
  migrationRunId: string | null;
  alreadyRequested: boolean;
} {
  if (!activeRun) {
    return { accepted: false, migrationRunId: null, alreadyRequested: false };
  }
  const alreadyRequested = activeRun.cancelRequested;
  activeRun.cancelRequested = true;
  return {
    accepted: true,
    migrationRunId: activeRun.id || null,
    alreadyRequested,
  };
}

function sumReports(reports: ImportReport[]) {
  return reports.reduce(
    (totals, report) => ({
      created: totals.created + report.created,
      updated: totals.updated + report.updated,
      skipped: totals.skipped + report.skipped,
      failed: totals.failed + report.failed,
    }),
    { created: 0, updated: 0, skipped: 0, failed: 0 },
  );
}

/**
 * Resolves the import order and claims the single run slot. Throws 400 for
 * unknown entities and 409 while another run is in progress.
 */
export function prepareMigration(options: RunMigrationInput): MigrationEntity[] {
  const entities = resolveMigrationOrder(options.entities, {
    includeDependencies: options.includeDependencies,
  });
  if (activeRun) throw conflict("A migration is already running");
  return entities;
}

/**
 * Runs one migration. Record-level failures are counted in the reports; a
 * thrown error (missing export, bad configuration) fails the whole run.
 */
export async function runMigration(
  options: RunMigrationOptions = {},
): Promise<MigrationResult> {
  const entities = prepareMigration(options);
  const dryRun = options.dryRun ?? false;
  const active: ActiveRun = { id: "", cancelRequested: false };
  activeRun = active;
  let run: MigrationRun;
  try {
    run = await migrationRunsRepo.startMigrationRun({ dryRun, entities });
  } catch (error) {
    activeRun = null;
    throw error;
  }
  active.id = run.id;

  return runWithRequestContext({ migrationRunId: run.id }, async () => {
    const log = logger.child({ migrationRunId: run.id });
    const exports: ExportSummary[] = [];
    const reports: ImportReport[] = [];
    resetProgress();
    progressHelpers.start(run.id, entities.length);
    log.info("Migration started", { entities, dryRun });

    try {
      let document = options.document;
      if (options.exportFirst) {
        progressHelpers.exporting();
        exports.push(
          ...(await exportAll({
            client: options.greenhouseClient,
            onEntity: (summary) => progressHelpers.exporting(summary.entity),
          })),
        );
        progressHelpers.transforming();
        document = (await writeTeamtailorExport()).document;
      }
      const source = document ?? (await requireTeamtailorExport());
      const dryRunPlan = createDryRunPlan();

      for (const entity of entities) {
        if (active.cancelRequested) break;
        const report = await runWithRequestContext({ entity }, () =>
          importEntity(entity, {
            client: options.teamtailorClient,
            document: source,
            dryRun,
            dryRunPlan,
            limit: options.limit,
            delayMs: options.delayMs,
            sleep: options.sleep,
            runId: run.id,
            isCancelled: () => active.cancelRequested,
            onStart: (recordsTotal) =>
              progressHelpers.entityStarted(entity, recordsTotal),
            onRecord: (outcome) => progressHelpers.recordDone(outcome.status),
          }),
        );
        reports.push(report);
        progressHelpers.entityDone(entity);
      }

      const totals = sumReports(reports);
      const status: MigrationRunStatus = active.cancelRequested
        ? "cancelled"
        : "completed";
      await migrationRunsRepo.completeMigrationRun({ id: run.id, status, ...totals });

      if (status === "cancelled") {
        progressHelpers.cancelled();
      } else {
        progressHelpers.complete();
      }
      log.info("Migration finished", { status, ...totals });

      await notifyMigrationWebhookStep("migration.completed", {
        migrationRunId: run.id,
        dryRun,
        entities,
        ...totals,
      });
      return { runId: run.id, status, dryRun, entities, exports, reports, ...totals };
    } catch (error) {
      const message = describeError(error);
      const totals = sumReports(reports);
      log.error("Migration failed", { error: message });
      await migrationRunsRepo.completeMigrationRun({
        id: run.id,
        status: "failed",
        ...totals,
        errorMessage: message,
      });
      progressHelpers.failed(message);
      await notifyMigrationWebhookStep("migration.failed", {
        migrationRunId: run.id,
        dryRun,
        entities,
        ...totals,
        error: message,
      });
      return {
        runId: run.id,
        status: "failed",
        dryRun,
        entities,
        exports,
        reports,
        ...totals,
        error: message,
      };
    } finally {
      activeRun = null;
    }
  });
}
