import { serviceUnavailable } from "@infra/errors";
import { z } from "zod";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  GREENHOUSE_API_KEY: optionalString,
  GREENHOUSE_API_URL: z
    .string()
    .trim()
    .url()
    .default("https://harvest.greenhouse.io/v1"),
  TT_TOKEN: optionalString,
  TT_BASE_URL: z
    .string()
    .trim()
    .url()
    .default("https://api.na.teamtailor.com/v1"),
  TT_API_VERSION: z.string().trim().min(1).default("20240904"),
  BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  EXPORT_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(6),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300_000).default(30_000),
  HTTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
  HTTP_MIN_INTERVAL_MS: z.coerce.number().int().min(0).max(10_000).default(200),
  MIGRATION_WEBHOOK_URL: optionalString,
  WEBHOOK_SECRET: optionalString,
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parses the process environment on every call so settings changed at
 * runtime (and in tests) are picked up. Empty strings count as unset.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const input: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    input[key] = value === "" ? undefined : value;
  }
  return envSchema.parse(input);
}

export function requireGreenhouseApiKey(config: AppConfig = getConfig()): string {
  if (!config.GREENHOUSE_API_KEY) {
    throw serviceUnavailable("GREENHOUSE_API_KEY is not configured");
  }
  return config.GREENHOUSE_API_KEY;
}

export function requireTeamtailorToken(config: AppConfig = getConfig()): string {
  if (!config.TT_TOKEN) {
    throw serviceUnavailable("TT_TOKEN is not configured");
  }
  return config.TT_TOKEN;
}
