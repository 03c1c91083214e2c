import { ok } from "@infra/http";
import { getConfig } from "@server/config/app-config";
import { type Request, type Response, Router } from "express";
import { getMigrationStatus } from "../../pipeline/index";

export const healthRouter = Router();

/**
 * GET /api/health - Liveness plus which upstreams are configured
 */
healthRouter.get("/", (_req: Request, res: Response) => {
  const config = getConfig();
  ok(res, {
    status: "ok",
    timestamp: new Date().toISOString(),
    greenhouseConfigured: Boolean(config.GREENHOUSE_API_KEY),
    teamtailorConfigured: Boolean(config.TT_TOKEN),
    migrationRunning: getMigrationStatus().isRunning,
  });
});
