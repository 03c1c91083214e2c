import { asyncRoute, ok } from "@infra/http";
import { getGreenhouseClient } from "@server/services/greenhouse/client";
import { CUSTOM_FIELD_TYPES, METADATA_ENDPOINTS } from "@server/services/greenhouse/export";
import { paginationQuerySchema } from "@shared/migration-schema";
import { Router } from "express";
import { z } from "zod";

/**
 * Read-only proxy over the Greenhouse Harvest API.
 */
export const greenhouseRouter = Router();

const COLLECTIONS = [
  "candidates",
  "applications",
  "jobs",
  "users",
  "offers",
  "scorecards",
  "scheduled_interviews",
  "job_posts",
  "approval_flows",
] as const;

const NESTED: Record<string, readonly string[]> = {
  candidates: ["activity_feed"],
  applications: [
    "demographics/answers",
    "scorecards",
    "scheduled_interviews",
    "offers",
    "offers/current_offer",
    "eeoc",
  ],
  jobs: ["job_posts", "approval_flows", "openings", "stages"],
  users: ["permissions/jobs", "pending_approvals"],
};

const idParamSchema = z.string().trim().regex(/^\d+$/, "Expected a numeric id");

const customFieldTypeSchema = z.enum(CUSTOM_FIELD_TYPES);

async function paginated(path: string, query: unknown) {
  const { page, per_page } = paginationQuerySchema.parse(query);
  return getGreenhouseClient().paginatedGet(path, { page, perPage: per_page });
}

for (const collection of COLLECTIONS) {
  greenhouseRouter.get(
    `/${collection}`,
    asyncRoute(async (req, res) => {
      ok(res, await paginated(`/${collection}`, req.query));
    }),
  );

  for (const nested of NESTED[collection] ?? []) {
    greenhouseRouter.get(
      `/${collection}/:id/${nested}`,
      asyncRoute(async (req, res) => {
        const id = idParamSchema.parse(req.params.id);
        ok(res, await getGreenhouseClient().get(`/${collection}/${id}/${nested}`));
      }),
    );
  }

  greenhouseRouter.get(
    `/${collection}/:id`,
    asyncRoute(async (req, res) => {
      const id = idParamSchema.parse(req.params.id);
      ok(res, await getGreenhouseClient().get(`/${collection}/${id}`));
    }),
  );
}

// Harvest exposes the current offer under both names.
greenhouseRouter.get(
  "/applications/:id/offer",
  asyncRoute(async (req, res) => {
    const id = idParamSchema.parse(req.params.id);
    ok(
      res,
      await getGreenhouseClient().get(`/applications/${id}/offers/current_offer`),
    );
  }),
);

for (const endpoint of METADATA_ENDPOINTS) {
  greenhouseRouter.get(
    `/metadata/${endpoint}`,
    asyncRoute(async (req, res) => {
      ok(res, await paginated(`/${endpoint}`, req.query));
    }),
  );
}

greenhouseRouter.get(
  "/custom_fields/:type",
  asyncRoute(async (req, res) => {
    const type = customFieldTypeSchema.parse(req.params.type);
    ok(res, await getGreenhouseClient().get(`/custom_fields/${type}`));
  }),
);

greenhouseRouter.get(
  "/custom_field/:id/custom_field_options",
  asyncRoute(async (req, res) => {
    const id = idParamSchema.parse(req.params.id);
    ok(res, await getGreenhouseClient().get(`/custom_field/${id}/custom_field_options`));
  }),
);
