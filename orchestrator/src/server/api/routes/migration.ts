import { conflict, notFound } from "@infra/errors";
import { asyncRoute, fail, ok } from "@infra/http";
import { logger } from "@infra/logger";
import { runWithRequestContext } from "@infra/request-context";
import { streamSse } from "@infra/sse";
import * as migrationLogsRepo from "@server/repositories/migration-logs";
import * as migrationRunsRepo from "@server/repositories/migration-runs";
import { runMigrationSchema } from "@shared/migration-schema";
import type { MigrationProgress, MigrationStatusResponse } from "@shared/types";
import { type Request, type Response, Router } from "express";
import { z } from "zod";
import {
  getMigrationStatus,
  getProgress,
  prepareMigration,
  requestMigrationCancel,
  resolveMigrationOrder,
  runMigration,
  subscribeToProgress,
} from "../../pipeline/index";

export const migrationRouter = Router();

const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(5000).default(500),
  offset: z.coerce.number().int().min(0).default(0),
});

const orderQuerySchema = z.object({
  entities: z.string().optional(),
  includeDependencies: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

/**
 * GET /api/migration/status - Whether a run is active, the last run and progress
 */
migrationRouter.get(
  "/status",
  asyncRoute(async (_req, res) => {
    const data: MigrationStatusResponse = {
      isRunning: getMigrationStatus().isRunning,
      lastRun: await migrationRunsRepo.getLatestMigrationRun(),
      progress: getProgress(),
    };
    ok(res, data);
  }),
);

/**
 * GET /api/migration/progress - Server-Sent Events endpoint for live progress
 */
migrationRouter.get("/progress", (req: Request, res: Response) => {
  streamSse<MigrationProgress>(req, res, subscribeToProgress);
});

/**
 * GET /api/migration/order - Resolved import order for a set of entities
 */
migrationRouter.get(
  "/order",
  asyncRoute(async (req, res) => {
    const query = orderQuerySchema.parse(req.query);
    const requested = query.entities
      ?.split(",")
      .map((entity) => entity.trim())
      .filter(Boolean);
    ok(res, {
      order: resolveMigrationOrder(requested, {
        includeDependencies: query.includeDependencies,
      }),
    });
  }),
);

/**
 * GET /api/migration/runs - Recent migration runs
 */
migrationRouter.get(
  "/runs",
  asyncRoute(async (_req, res) => {
    ok(res, await migrationRunsRepo.listMigrationRuns(20));
  }),
);

/**
 * GET /api/migration/runs/:id/logs - Per-record log of one run
 */
migrationRouter.get(
  "/runs/:id/logs",
  asyncRoute(async (req, res) => {
    const run = await migrationRunsRepo.getMigrationRun(req.params.id);
    if (!run) throw notFound(`Migration run ${req.params.id} not found`);
    const { limit, offset } = logsQuerySchema.parse(req.query);
    ok(res, {
      run,
      logs: await migrationLogsRepo.listMigrationLogs(run.id, { limit, offset }),
    });
  }),
);

/**
 * POST /api/migration/run - Start a migration in the background
 */
migrationRouter.post(
  "/run",
  asyncRoute(async (req, res) => {
    const input = runMigrationSchema.parse(req.body ?? {});
    const entities = prepareMigration(input);

    runWithRequestContext({}, () => {
      runMigration(input).catch((error: unknown) => {
        logger.error("Background migration run failed", error);
      });
    });
    ok(res, { message: "Migration started", entities }, 202);
  }),
);

/**
 * POST /api/migration/cancel - Request cancellation of the active run
 */
migrationRouter.post(
  "/cancel",
  asyncRoute(async (_req, res) => {
    const cancelResult = requestMigrationCancel();
    if (!cancelResult.accepted) {
      return fail(res, conflict("No running migration to cancel"));
    }

    logger.info("Migration cancellation requested", {
      route: "/api/migration/cancel",
      migrationRunId: cancelResult.migrationRunId,
      alreadyRequested: cancelResult.alreadyRequested,
    });

    ok(res, {
      message: cancelResult.alreadyRequested
        ? "Migration cancellation already requested"
        : "Migration cancellation requested",
      migrationRunId: cancelResult.migrationRunId,
      alreadyRequested: cancelResult.alreadyRequested,
    });
  }),
);
