import { asyncRoute, ok } from "@infra/http";
import {
  addCandidatesToPool,
  addCandidateToPool,
  createProspectPool,
  deleteProspectPool,
  getPoolCandidates,
  getPoolStats,
  getProspectPool,
  listProspectPools,
  migrateProspects,
  removeCandidateFromPool,
  updateProspectPool,
} from "@server/services/teamtailor/prospects";
import {
  bulkPoolCandidatesSchema,
  createProspectPoolSchema,
  poolCandidateSchema,
  poolCandidatesQuerySchema,
  prospectMigrationSchema,
  updateProspectPoolSchema,
} from "@shared/migration-schema";
import { Router } from "express";

export const prospectsRouter = Router();

/**
 * GET /api/prospects/pools - Prospect pools in Teamtailor
 */
prospectsRouter.get(
  "/pools",
  asyncRoute(async (_req, res) => {
    ok(res, await listProspectPools());
  }),
);

prospectsRouter.post(
  "/pools",
  asyncRoute(async (req, res) => {
    ok(res, await createProspectPool(createProspectPoolSchema.parse(req.body ?? {})), 201);
  }),
);

prospectsRouter.get(
  "/pools/:poolId",
  asyncRoute(async (req, res) => {
    ok(res, await getProspectPool(req.params.poolId));
  }),
);

prospectsRouter.patch(
  "/pools/:poolId",
  asyncRoute(async (req, res) => {
    const input = updateProspectPoolSchema.parse(req.body ?? {});
    ok(res, await updateProspectPool(req.params.poolId, input));
  }),
);

prospectsRouter.delete(
  "/pools/:poolId",
  asyncRoute(async (req, res) => {
    await deleteProspectPool(req.params.poolId);
    ok(res, { poolId: req.params.poolId, deleted: true });
  }),
);

/**
 * GET /api/prospects/pools/:poolId/candidates - One page of pool members
 */
prospectsRouter.get(
  "/pools/:poolId/candidates",
  asyncRoute(async (req, res) => {
    const query = poolCandidatesQuerySchema.parse(req.query);
    ok(res, await getPoolCandidates(req.params.poolId, query));
  }),
);

prospectsRouter.post(
  "/pools/:poolId/candidates",
  asyncRoute(async (req, res) => {
    const { candidateId } = poolCandidateSchema.parse(req.body ?? {});
    ok(res, await addCandidateToPool(req.params.poolId, candidateId), 201);
  }),
);

prospectsRouter.post(
  "/pools/:poolId/candidates/bulk",
  asyncRoute(async (req, res) => {
    const { candidateIds } = bulkPoolCandidatesSchema.parse(req.body ?? {});
    ok(res, await addCandidatesToPool(req.params.poolId, candidateIds));
  }),
);

prospectsRouter.delete(
  "/pools/:poolId/candidates/:candidateId",
  asyncRoute(async (req, res) => {
    const { poolId, candidateId } = req.params;
    await removeCandidateFromPool(poolId, candidateId);
    ok(res, { poolId, candidateId, removed: true });
  }),
);

prospectsRouter.get(
  "/pools/:poolId/stats",
  asyncRoute(async (req, res) => {
    ok(res, await getPoolStats(req.params.poolId));
  }),
);

/**
 * POST /api/prospects/migrate/greenhouse - Add exported candidates to a pool
 */
prospectsRouter.post(
  "/migrate/greenhouse",
  asyncRoute(async (req, res) => {
    ok(res, await migrateProspects(prospectMigrationSchema.parse(req.body ?? {})));
  }),
);
