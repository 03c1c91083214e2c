import { logger } from "@infra/logger";
import { getConfig } from "@server/config/app-config";
import * as settingsRepo from "@server/repositories/settings";
import {
  customFieldMappingSchema,
  type UpdateSettingsInput,
} from "@shared/migration-schema";
import type { AppSettings, CustomFieldMapping } from "@shared/types";

async function readCustomFieldMapping(): Promise<CustomFieldMapping> {
  const raw = await settingsRepo.getSetting("customFieldMapping");
  if (!raw) return {};
  try {
    return customFieldMappingSchema.parse(JSON.parse(raw));
  } catch (error) {
    logger.warn("Ignoring invalid stored custom field mapping", { error });
    return {};
  }
}

/**
 * Settings stored in the database, with the environment default for the
 * migration webhook alongside the override.
 */
export async function getAppSettings(): Promise<AppSettings> {
  return {
    customFieldMapping: await readCustomFieldMapping(),
    migrationWebhookUrl: await settingsRepo.getSetting("migrationWebhookUrl"),
    defaultMigrationWebhookUrl: getConfig().MIGRATION_WEBHOOK_URL ?? null,
  };
}

export async function updateAppSettings(
  input: UpdateSettingsInput,
): Promise<AppSettings> {
  if (input.customFieldMapping !== undefined) {
    const mapping = input.customFieldMapping;
    await settingsRepo.setSetting(
      "customFieldMapping",
      mapping && Object.keys(mapping).length > 0 ? JSON.stringify(mapping) : null,
    );
  }
  if (input.migrationWebhookUrl !== undefined) {
    await settingsRepo.setSetting("migrationWebhookUrl", input.migrationWebhookUrl);
  }
  return getAppSettings();
}

export async function getCustomFieldMapping(): Promise<CustomFieldMapping> {
  return readCustomFieldMapping();
}

/** The settings override wins over MIGRATION_WEBHOOK_URL. */
export async function getMigrationWebhookUrl(): Promise<string | null> {
  const override = await settingsRepo.getSetting("migrationWebhookUrl");
  return override ?? getConfig().MIGRATION_WEBHOOK_URL ?? null;
}
