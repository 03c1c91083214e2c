import type { MigrationLog, MigrationLogStatus } from "@shared/types";
import { asc, eq } from "drizzle-orm";
import { db, schema } from "../db";

const { migrationLogs } = schema;

export type AppendMigrationLogInput = {
  runId: string | null;
  operation: string;
  entityType: string;
  externalId: string;
  teamtailorId?: string | null;
  status: MigrationLogStatus;
  errorMessage?: string | null;
};

function mapRowToLog(row: typeof migrationLogs.$inferSelect): MigrationLog {
  return {
    id: row.id,
    runId: row.runId,
    operation: row.operation,
    entityType: row.entityType,
    externalId: row.externalId,
    teamtailorId: row.teamtailorId,
    status: row.status,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
  };
}

export async function appendMigrationLog(
  input: AppendMigrationLogInput,
): Promise<void> {
  await db.insert(migrationLogs).values({
    runId: input.runId,
    operation: input.operation,
    entityType: input.entityType,
    externalId: input.externalId,
    teamtailorId: input.teamtailorId ?? null,
    status: input.status,
    errorMessage: input.errorMessage ?? null,
    createdAt: new Date().toISOString(),
  });
}

export async function listMigrationLogs(
  runId: string,
  options: { limit?: number; offset?: number } = {},
): Promise<MigrationLog[]> {
  const rows = await db
    .select()
    .from(migrationLogs)
    .where(eq(migrationLogs.runId, runId))
    .orderBy(asc(migrationLogs.id))
    .limit(options.limit ?? 500)
    .offset(options.offset ?? 0);
  return rows.map(mapRowToLog);
}
