import { randomUUID } from "node:crypto";
import { migrationEntitySchema } from "@shared/migration-schema";
import type {
  MigrationEntity,
  MigrationRun,
  MigrationRunStatus,
} from "@shared/types";
import { desc, eq } from "drizzle-orm";
import { z } from "zod";
import { db, schema } from "../db";

const { migrationRuns } = schema;

const storedEntitiesSchema = z.array(migrationEntitySchema).catch([]);

type CompleteMigrationRunInput = {
  id: string;
  status: Exclude<MigrationRunStatus, "running">;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  errorMessage?: string | null;
};

function parseEntities(value: string): MigrationEntity[] {
  try {
    return storedEntitiesSchema.parse(JSON.parse(value));
  } catch {
    return [];
  }
}

function mapRowToRun(row: typeof migrationRuns.$inferSelect): MigrationRun {
  return {
    id: row.id,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    status: row.status,
    dryRun: row.dryRun,
    entities: parseEntities(row.entities),
    created: row.created,
    updated: row.updated,
    skipped: row.skipped,
    failed: row.failed,
    errorMessage: row.errorMessage,
  };
}

export async function startMigrationRun(input: {
  dryRun: boolean;
  entities: MigrationEntity[];
}): Promise<MigrationRun> {
  const id = randomUUID();
  await db.insert(migrationRuns).values({
    id,
    startedAt: new Date().toISOString(),
    status: "running",
    dryRun: input.dryRun,
    entities: JSON.stringify(input.entities),
  });
  const run = await getMigrationRun(id);
  if (!run) throw new Error(`Migration run ${id} was not persisted`);
  return run;
}

export async function completeMigrationRun(
  input: CompleteMigrationRunInput,
): Promise<MigrationRun | null> {
  await db
    .update(migrationRuns)
    .set({
      status: input.status,
      completedAt: new Date().toISOString(),
      created: input.created,
      updated: input.updated,
      skipped: input.skipped,
      failed: input.failed,
      errorMessage: input.errorMessage ?? null,
    })
    .where(eq(migrationRuns.id, input.id));
  return getMigrationRun(input.id);
}

export async function getMigrationRun(id: string): Promise<MigrationRun | null> {
  const [row] = await db
    .select()
    .from(migrationRuns)
    .where(eq(migrationRuns.id, id));
  return row ? mapRowToRun(row) : null;
}

export async function listMigrationRuns(limit = 20): Promise<MigrationRun[]> {
  const rows = await db
    .select()
    .from(migrationRuns)
    .orderBy(desc(migrationRuns.startedAt))
    .limit(limit);
  return rows.map(mapRowToRun);
}

export async function getLatestMigrationRun(): Promise<MigrationRun | null> {
  const [run] = await listMigrationRuns(1);
  return run ?? null;
}
