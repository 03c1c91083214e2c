import { logger } from "@infra/logger";
import { sanitizeWebhookPayload } from "@infra/sanitize";
import { getConfig } from "@server/config/app-config";
import { getMigrationWebhookUrl } from "@server/services/settings";

export type MigrationWebhookEvent = "migration.completed" | "migration.failed";

export async function notifyMigrationWebhookStep(
  event: MigrationWebhookEvent,
  payload: Record<string, unknown>,
  fetchImpl: typeof fetch = fetch,
): Promise<void> {
  const webhookUrl = await getMigrationWebhookUrl();
  if (!webhookUrl) return;

  try {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    const secret = getConfig().WEBHOOK_SECRET;
    if (secret) headers.Authorization = `Bearer ${secret}`;

    const sanitizedPayload = sanitizeWebhookPayload({
      event,
      sentAt: new Date().toISOString(),
      migrationRunId: payload.migrationRunId,
      dryRun: payload.dryRun,
      entities: payload.entities,
      created: payload.created,
      updated: payload.updated,
      skipped: payload.skipped,
      failed: payload.failed,
      error: payload.error,
    });

    const response = await fetchImpl(webhookUrl, {
      method: "POST",
      headers,
      body: JSON.stringify(sanitizedPayload),
    });

    if (!response.ok) {
      const responseText = await response.text().catch(() => "");
      logger.warn("Migration webhook POST failed", {
        status: response.status,
        error: responseText.slice(0, 200),
      });
    }
  } catch (error) {
    logger.warn("Migration webhook POST failed", error);
  }
}
