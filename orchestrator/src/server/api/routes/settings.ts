import { asyncRoute, ok } from "@infra/http";
import { logger } from "@infra/logger";
import { getAppSettings, updateAppSettings } from "@server/services/settings";
import { updateSettingsSchema } from "@shared/migration-schema";
import { Router } from "express";

export const settingsRouter = Router();

/**
 * GET /api/settings - Stored settings with environment defaults
 */
settingsRouter.get(
  "/",
  asyncRoute(async (_req, res) => {
    ok(res, await getAppSettings());
  }),
);

/**
 * PATCH /api/settings - Update the custom-field mapping or webhook override
 */
settingsRouter.patch(
  "/",
  asyncRoute(async (req, res) => {
    const input = updateSettingsSchema.parse(req.body ?? {});
    const data = await updateAppSettings(input);
    logger.info("Settings updated", { keys: Object.keys(input) });
    ok(res, data);
  }),
);
