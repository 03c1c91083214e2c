import { readdir, readFile } from "node:fs/promises";
import { join, relative } from "node:path";
import { getJsonDir } from "@server/config/dataDir";
import type { ExportStats } from "@shared/types";
import { isRecord } from "@shared/utils/records";

function countRecords(data: unknown): number {
  if (Array.isArray(data)) return data.length;
  return data === null ? 0 : 1;
}

/**
 * Record counts per exported JSON file, keyed by the path under json/
 * without its extension. A file that cannot be parsed reports its error.
 */
export async function getExportStats(): Promise<ExportStats> {
  const root = getJsonDir();
  let entries: string[];
  try {
    entries = await readdir(root, { recursive: true });
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") return { counts: {} };
    throw error;
  }

  const counts: ExportStats["counts"] = {};
  for (const entry of entries.filter((name) => name.endsWith(".json")).sort()) {
    const path = join(root, entry);
    const key = relative(root, path).replace(/\\/g, "/").replace(/\.json$/, "");
    try {
      const data: unknown = JSON.parse(await readFile(path, "utf-8"));
      counts[key] = countRecords(data);
    } catch (error) {
      counts[key] = `error: ${error instanceof Error ? error.message : String(error)}`;
    }
  }
  return { counts };
}
