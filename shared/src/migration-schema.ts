import { z } from "zod";
import { EXPORT_ENTITIES, MIGRATION_ENTITIES } from "./types";

export const migrationEntitySchema = z.enum(MIGRATION_ENTITIES);

export const exportTargetSchema = z.enum([...EXPORT_ENTITIES, "all"] as const);

export const importOptionsSchema = z.object({
  limit: z.number().int().min(1).max(10_000).optional(),
  delayMs: z.number().int().min(0).max(10_000).optional(),
  dryRun: z.boolean().optional(),
});

export type ImportOptions = z.infer<typeof importOptionsSchema>;

export const runMigrationSchema = importOptionsSchema.extend({
  entities: z.array(migrationEntitySchema).min(1).optional(),
  includeDependencies: z.boolean().optional(),
  exportFirst: z.boolean().optional(),
});

export type RunMigrationInput = z.infer<typeof runMigrationSchema>;

/** Query-string pagination for read-only proxy routes. */
export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(1000).default(100),
});

export const customFieldMappingSchema = z
  .object({
    status: z.string().trim().min(1),
    sent_at: z.string().trim().min(1),
    resolved_at: z.string().trim().min(1),
    starts_at: z.string().trim().min(1),
    salary: z.string().trim().min(1),
    proposal_url: z.string().trim().min(1),
  })
  .partial()
  .strict();

export const updateSettingsSchema = z
  .object({
    customFieldMapping: customFieldMappingSchema.nullable().optional(),
    migrationWebhookUrl: z
      .preprocess(
        (value) => (value === "" ? null : value),
        z.string().trim().url().max(2000).nullable(),
      )
      .optional(),
  })
  .strict();

export type UpdateSettingsInput = z.infer<typeof updateSettingsSchema>;

export const addTagsSchema = z
  .object({
    tags: z.array(z.string().trim().min(1).max(100)).min(1).max(50),
    candidateIds: z.array(z.string().trim().min(1)).max(500).default([]),
  })
  .refine((value) => value.candidateIds.length > 0, {
    message: "candidateIds must not be empty",
    path: ["candidateIds"],
  });

export const analyticsQuerySchema = z.object({
  maxCandidates: z.coerce.number().int().min(1).max(5000).default(500),
});

const poolColorSchema = z
  .string()
  .trim()
  .regex(/^#[0-9a-fA-F]{6}$/, "color must be a hex value like #1a2b3c");

export const createProspectPoolSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().trim().max(2000).optional(),
  color: poolColorSchema.optional(),
});

export const updateProspectPoolSchema = createProspectPoolSchema
  .partial()
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided",
  });

export const poolCandidateSchema = z.object({
  candidateId: z.string().trim().min(1),
});

export const bulkPoolCandidatesSchema = z.object({
  candidateIds: z.array(z.string().trim().min(1)).min(1).max(500),
});

export const poolCandidatesQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(30).default(20),
});

export const prospectMigrationSchema = z.object({
  poolName: z.string().trim().min(1).max(200).default("Greenhouse Prospects"),
  limit: z.number().int().min(1).max(10_000).optional(),
  dryRun: z.boolean().optional(),
});

export type ProspectMigrationInput = z.infer<typeof prospectMigrationSchema>;
