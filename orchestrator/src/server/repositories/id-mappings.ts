/**
 * Id mapping repository - remembers which Teamtailor record each external id
 * became, so re-running an import never creates the same record twice.
 */

import type { MigrationEntity } from "@shared/types";
import { and, eq, sql } from "drizzle-orm";
import { db, schema } from "../db";

const { idMappings } = schema;

export async function getMappedId(
  entity: MigrationEntity,
  externalId: string,
): Promise<string | null> {
  const [row] = await db
    .select({ teamtailorId: idMappings.teamtailorId })
    .from(idMappings)
    .where(and(eq(idMappings.entity, entity), eq(idMappings.externalId, externalId)));
  return row?.teamtailorId ?? null;
}

export async function saveMapping(
  entity: MigrationEntity,
  externalId: string,
  teamtailorId: string,
): Promise<void> {
  const now = new Date().toISOString();
  await db
    .insert(idMappings)
    .values({ entity, externalId, teamtailorId, createdAt: now, updatedAt: now })
    .onConflictDoUpdate({
      target: [idMappings.entity, idMappings.externalId],
      set: { teamtailorId, updatedAt: now },
    });
}

export async function countMappingsByEntity(): Promise<Record<string, number>> {
  const rows = await db
    .select({ entity: idMappings.entity, count: sql<number>`count(*)` })
    .from(idMappings)
    .groupBy(idMappings.entity);
  return Object.fromEntries(rows.map((row) => [row.entity, row.count]));
}

export async function deleteMappings(entity?: MigrationEntity): Promise<number> {
  const result = entity
    ? await db.delete(idMappings).where(eq(idMappings.entity, entity))
    : await db.delete(idMappings);
  return result.changes;
}
