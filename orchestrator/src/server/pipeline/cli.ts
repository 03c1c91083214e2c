/**
 * Body of the standalone migration runner. Returns the process exit code.
 */

import "../db/migrate";
import { ZodError } from "zod";
import { closeDb } from "../db/index";
import { MIGRATE_USAGE, parseMigrateArgs } from "./cli-args";
import { runMigration } from "./orchestrator";

export async function runCli(argv: string[]): Promise<number> {
  let input: ReturnType<typeof parseMigrateArgs>;
  try {
    input = parseMigrateArgs(argv);
  } catch (error) {
    const message =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n")
        : error instanceof Error
          ? error.message
          : String(error);
    console.error(`❌ ${message}\n\n${MIGRATE_USAGE}`);
    return 2;
  }
  if (input === null) {
    console.log(MIGRATE_USAGE);
    return 0;
  }

  console.log("=".repeat(60));
  console.log("🚚 Greenhouse → Teamtailor migration");
  console.log(`   Started at: ${new Date().toISOString()}`);
  if (input.dryRun) console.log("   Dry run: nothing is written to Teamtailor");
  console.log("=".repeat(60));

  try {
    const result = await runMigration(input);

    console.log(`\n${"=".repeat(60)}`);
    console.log("📊 Migration results:");
    console.log(`   Run: ${result.runId} (${result.status})`);
    for (const report of result.reports) {
      console.log(
        `   ${report.entity}: ${report.created} created, ${report.updated} updated, ${report.skipped} skipped, ${report.failed} failed`,
      );
    }
    if (result.error) {
      console.log(`   Error: ${result.error}`);
    }
    console.log(`   Completed at: ${new Date().toISOString()}`);
    console.log("=".repeat(60));

    return result.status === "failed" ? 1 : 0;
  } finally {
    closeDb();
  }
}
