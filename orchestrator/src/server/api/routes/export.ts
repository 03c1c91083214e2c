import { asyncRoute, ok } from "@infra/http";
import { logger } from "@infra/logger";
import { runWithRequestContext } from "@infra/request-context";
import { exportAll, exportEntity } from "@server/services/greenhouse/export";
import {
  requireTeamtailorExport,
  teamtailorExportPath,
  writeTeamtailorExport,
} from "@server/services/transform";
import { exportTargetSchema } from "@shared/migration-schema";
import { Router } from "express";

export const exportRouter = Router();

/**
 * GET /api/export/teamtailor - Build the Teamtailor export from the raw files
 */
exportRouter.get(
  "/teamtailor",
  asyncRoute(async (_req, res) => {
    const { document } = await writeTeamtailorExport();
    ok(res, document);
  }),
);

/**
 * GET /api/export/teamtailor/download - Send the saved export as a file
 */
exportRouter.get(
  "/teamtailor/download",
  asyncRoute(async (_req, res) => {
    await requireTeamtailorExport();
    res.download(teamtailorExportPath(), "teamtailor_export.json");
  }),
);

/**
 * POST /api/export/:entity - Export one Greenhouse entity (or `all`) in the background
 */
exportRouter.post(
  "/:entity",
  asyncRoute(async (req, res) => {
    const target = exportTargetSchema.parse(req.params.entity);

    runWithRequestContext({}, () => {
      const task = target === "all" ? exportAll() : exportEntity(target);
      task.catch((error: unknown) => {
        logger.error("Background export failed", { target, error });
      });
    });
    ok(res, { message: `Export of ${target} started` }, 202);
  }),
);
