import { asyncRoute, ok } from "@infra/http";
import { importEntity } from "@server/services/teamtailor/importers";
import { importOptionsSchema, migrationEntitySchema } from "@shared/migration-schema";
import { Router } from "express";

export const importRouter = Router();

/**
 * POST /api/import/:entity - Import one entity into Teamtailor and return the report
 */
importRouter.post(
  "/:entity",
  asyncRoute(async (req, res) => {
    const entity = migrationEntitySchema.parse(req.params.entity);
    const options = importOptionsSchema.parse(req.body ?? {});
    ok(res, await importEntity(entity, options));
  }),
);
