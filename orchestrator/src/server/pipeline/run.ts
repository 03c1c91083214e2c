/**
 * Standalone migration runner for cron or manual use.
 *
 * Usage: npm run migrate -- --entities jobs,candidates --dry-run
 */

import "../config/env";
import { runCli } from "./cli";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  },
);
