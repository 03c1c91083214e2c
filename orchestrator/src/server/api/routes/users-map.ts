import { asyncRoute, ok } from "@infra/http";
import { buildUsersMap } from "@server/services/teamtailor/users-map";
import { Router } from "express";

export const usersMapRouter = Router();

/**
 * POST /api/users-map - Match exported users to Teamtailor users by email
 */
usersMapRouter.post(
  "/",
  asyncRoute(async (_req, res) => {
    ok(res, await buildUsersMap());
  }),
);
