import { unauthorized } from "@infra/errors";
import { asyncRoute, fail, ok } from "@infra/http";
import { logger } from "@infra/logger";
import { runWithRequestContext } from "@infra/request-context";
import { getConfig } from "@server/config/app-config";
import { runMigrationSchema } from "@shared/migration-schema";
import { Router } from "express";
import { prepareMigration, runMigration } from "../../pipeline/index";

export const webhookRouter = Router();

/**
 * POST /api/webhook/trigger - Start a migration from a scheduler or automation tool
 */
webhookRouter.post(
  "/trigger",
  asyncRoute(async (req, res) => {
    const expectedToken = getConfig().WEBHOOK_SECRET;
    if (expectedToken && req.headers.authorization !== `Bearer ${expectedToken}`) {
      return fail(res, unauthorized());
    }

    const input = runMigrationSchema.parse(req.body ?? {});
    const entities = prepareMigration(input);
    runWithRequestContext({}, () => {
      runMigration(input).catch((error: unknown) => {
        logger.error("Webhook-triggered migration failed", error);
      });
    });

    ok(
      res,
      {
        message: "Migration triggered",
        entities,
        triggeredAt: new Date().toISOString(),
      },
      202,
    );
  }),
);
