import { asyncRoute, ok } from "@infra/http";
import { getExportStats } from "@server/services/stats";
import {
  addTagsToCandidates,
  getAvailableTags,
  getCandidateTags,
  getTeamtailorAnalytics,
} from "@server/services/teamtailor/analytics";
import { addTagsSchema, analyticsQuerySchema } from "@shared/migration-schema";
import { Router } from "express";

export const statsRouter = Router();
export const analyticsRouter = Router();
export const tagsRouter = Router();

/**
 * GET /api/stats - Record counts of the exported files
 */
statsRouter.get(
  "/",
  asyncRoute(async (_req, res) => {
    ok(res, await getExportStats());
  }),
);

/**
 * GET /api/analytics/teamtailor - Tag analytics over Teamtailor candidates
 */
analyticsRouter.get(
  "/teamtailor",
  asyncRoute(async (req, res) => {
    const { maxCandidates } = analyticsQuerySchema.parse(req.query);
    ok(res, await getTeamtailorAnalytics({ maxCandidates }));
  }),
);

tagsRouter.get(
  "/available",
  asyncRoute(async (_req, res) => {
    ok(res, await getAvailableTags());
  }),
);

tagsRouter.get(
  "/candidate/:id",
  asyncRoute(async (req, res) => {
    ok(res, await getCandidateTags(req.params.id));
  }),
);

/**
 * POST /api/tags/add - Merge tags into each listed candidate
 */
tagsRouter.post(
  "/add",
  asyncRoute(async (req, res) => {
    ok(res, await addTagsToCandidates(addTagsSchema.parse(req.body ?? {})));
  }),
);
