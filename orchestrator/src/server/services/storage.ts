/**
 * File storage for exports and reports under DATA_DIR (json/ and csv/).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { getCsvDir, getJsonDir } from "@server/config/dataDir";
import { isRecord, type UnknownRecord } from "@shared/utils/records";

function formatCsvValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  const text =
    typeof value === "string"
      ? value
      : typeof value === "object"
        ? JSON.stringify(value)
        : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Serialises rows as CSV; the header is the sorted union of row keys. */
export function toCsv(rows: UnknownRecord[]): string {
  if (rows.length === 0) return "";
  const columns = [...new Set(rows.flatMap((row) => Object.keys(row)))].sort();
  const lines = [columns.map(formatCsvValue).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCsvValue(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

async function writeText(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
  return path;
}

export async function saveJson(name: string, data: unknown): Promise<string> {
  return writeText(
    join(getJsonDir(), `${name}.json`),
    `${JSON.stringify(data, null, 2)}\n`,
  );
}

export async function saveCsv(name: string, rows: UnknownRecord[]): Promise<string> {
  return writeText(join(getCsvDir(), `${name}.csv`), toCsv(rows));
}

/** Writes `json/<name>.json` and `csv/<name>.csv`, returning both paths. */
export async function saveRecords(
  name: string,
  rows: UnknownRecord[],
): Promise<string[]> {
  return [await saveJson(name, rows), await saveCsv(name, rows)];
}

/** Reads `json/<name>.json`; a missing file yields null. */
export async function readJson(name: string): Promise<unknown> {
  try {
    const parsed: unknown = JSON.parse(
      await readFile(join(getJsonDir(), `${name}.json`), "utf-8"),
    );
    return parsed;
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

export async function readRecords(name: string): Promise<UnknownRecord[]> {
  const data = await readJson(name);
  return Array.isArray(data) ? data.filter(isRecord) : [];
}
