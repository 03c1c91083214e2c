import { parseArgs } from "node:util";
import { type RunMigrationInput, runMigrationSchema } from "@shared/migration-schema";

export const MIGRATE_USAGE = `Usage: npm run migrate -- [options]

  --entities <list>      Comma-separated entities to import (default: all)
  --with-dependencies    Also import every entity the selection depends on
  --export               Export from Greenhouse and rebuild the export first
  --dry-run              Resolve and report without writing to Teamtailor
  --limit <n>            Import at most n records per entity
  --delay <ms>           Pause between records
  --help                 Show this message`;

function toInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

/**
 * Parses `migrate` flags into run options. Returns null for --help; throws
 * a ZodError for invalid values.
 */
export function parseMigrateArgs(argv: string[]): RunMigrationInput | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      entities: { type: "string" },
      "with-dependencies": { type: "boolean" },
      export: { type: "boolean" },
      "dry-run": { type: "boolean" },
      limit: { type: "string" },
      delay: { type: "string" },
      help: { type: "boolean" },
    },
    strict: true,
  });
  if (values.help) return null;

  const entities = values.entities
    ?.split(",")
    .map((entity) => entity.trim())
    .filter(Boolean);

  return runMigrationSchema.parse({
    entities: entities && entities.length > 0 ? entities : undefined,
    includeDependencies: values["with-dependencies"],
    exportFirst: values.export,
    dryRun: values["dry-run"],
    limit: toInt(values.limit),
    delayMs: toInt(values.delay),
  });
}
