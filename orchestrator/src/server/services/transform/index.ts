import { join } from "node:path";
import { notFound } from "@infra/errors";
import { logger } from "@infra/logger";
import { getJsonDir } from "@server/config/dataDir";
import { readJson, readRecords, saveJson } from "@server/services/storage";
import { teamtailorExportSchema } from "@shared/export-schema";
import type { TeamtailorExport } from "@shared/types";
import { buildTeamtailorExport, type GreenhouseSource } from "./build-export";

export * from "./build-export";

export const TEAMTAILOR_EXPORT_NAME = "teamtailor_export";

const log = logger.child({ service: "teamtailor-transform" });

export function teamtailorExportPath(): string {
  return join(getJsonDir(), `${TEAMTAILOR_EXPORT_NAME}.json`);
}

export async function loadGreenhouseSource(): Promise<GreenhouseSource> {
  const [users, jobs, candidates, applications, offers, interviews, scorecards] =
    await Promise.all([
      readRecords("users"),
      readRecords("jobs"),
      readRecords("candidates"),
      readRecords("applications"),
      readRecords("offers"),
      readRecords("scheduled_interviews"),
      readRecords("scorecards"),
    ]);
  return { users, jobs, candidates, applications, offers, interviews, scorecards };
}

/** Builds the export from the raw files on disk and saves it. */
export async function writeTeamtailorExport(): Promise<{
  document: TeamtailorExport;
  path: string;
}> {
  const document = buildTeamtailorExport(await loadGreenhouseSource());
  const path = await saveJson(TEAMTAILOR_EXPORT_NAME, document);
  log.info("Teamtailor export written", { path, counts: document.meta.counts });
  return { document, path };
}

/** Reads the saved export; null when it has not been generated yet. */
export async function loadTeamtailorExport(): Promise<TeamtailorExport | null> {
  const raw = await readJson(TEAMTAILOR_EXPORT_NAME);
  if (raw === null) return null;
  return teamtailorExportSchema.parse(raw);
}

export async function requireTeamtailorExport(): Promise<TeamtailorExport> {
  const document = await loadTeamtailorExport();
  if (!document) {
    throw notFound("Teamtailor export not found; run the export first");
  }
  return document;
}
