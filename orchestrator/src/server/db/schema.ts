/**
 * Database schema using Drizzle ORM with SQLite.
 */

import { sql } from "drizzle-orm";
import { integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

export const idMappings = sqliteTable(
  "id_mappings",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    entity: text("entity").notNull(),
    externalId: text("external_id").notNull(),
    teamtailorId: text("teamtailor_id").notNull(),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
    updatedAt: text("updated_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => ({
    entityExternalIdUnique: uniqueIndex("idx_id_mappings_entity_external_id").on(
      table.entity,
      table.externalId,
    ),
  }),
);

export const migrationRuns = sqliteTable("migration_runs", {
  id: text("id").primaryKey(),
  startedAt: text("started_at").notNull().default(sql`(datetime('now'))`),
  completedAt: text("completed_at"),
  status: text("status", {
    enum: ["running", "completed", "failed", "cancelled"],
  })
    .notNull()
    .default("running"),
  dryRun: integer("dry_run", { mode: "boolean" }).notNull().default(false),
  entities: text("entities").notNull().default("[]"),
  created: integer("created").notNull().default(0),
  updated: integer("updated").notNull().default(0),
  skipped: integer("skipped").notNull().default(0),
  failed: integer("failed").notNull().default(0),
  errorMessage: text("error_message"),
});

export const migrationLogs = sqliteTable("migration_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  runId: text("run_id").references(() => migrationRuns.id, {
    onDelete: "cascade",
  }),
  operation: text("operation").notNull(),
  entityType: text("entity_type").notNull(),
  externalId: text("external_id").notNull(),
  teamtailorId: text("teamtailor_id"),
  status: text("status", {
    enum: ["created", "updated", "skipped", "failed"],
  }).notNull(),
  errorMessage: text("error_message"),
  createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
});

export const settings = sqliteTable("settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  updatedAt: text("updated_at").notNull().default(sql`(datetime('now'))`),
});

export type IdMappingRow = typeof idMappings.$inferSelect;
export type NewIdMappingRow = typeof idMappings.$inferInsert;
export type MigrationRunRow = typeof migrationRuns.$inferSelect;
export type NewMigrationRunRow = typeof migrationRuns.$inferInsert;
export type MigrationLogRow = typeof migrationLogs.$inferSelect;
export type NewMigrationLogRow = typeof migrationLogs.$inferInsert;
export type SettingsRow = typeof settings.$inferSelect;
export type NewSettingsRow = typeof settings.$inferInsert;
