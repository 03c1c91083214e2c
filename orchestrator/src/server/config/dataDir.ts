import { existsSync } from "node:fs";
import { basename, join, resolve } from "node:path";

let cachedDir: string | null = null;

export function getDataDir(): string {
  const fromEnv = (process.env.DATA_DIR || "").trim();
  if (fromEnv) return fromEnv;

  if (cachedDir) return cachedDir;

  const cwd = process.cwd();
  const parentDir = join(cwd, "..");
  const parentLooksLikeRoot = [
    join(parentDir, "package.json"),
    join(parentDir, ".env"),
  ].some((marker) => existsSync(marker));
  const candidates =
    basename(cwd) === "orchestrator" && parentLooksLikeRoot
      ? [join(parentDir, "data"), join(cwd, "data")]
      : [join(cwd, "data"), join(parentDir, "data")];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      cachedDir = resolve(candidate);
      return cachedDir;
    }
  }

  cachedDir = resolve(join(cwd, "data"));
  return cachedDir;
}

/** Directory holding exported JSON documents and import reports. */
export function getJsonDir(): string {
  return join(getDataDir(), "json");
}

export function getCsvDir(): string {
  return join(getDataDir(), "csv");
}
