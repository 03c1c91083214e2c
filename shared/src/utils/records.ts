/**
 * Helpers for reading loosely-typed JSON records returned by upstream APIs.
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toStringOrNull(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

export function getString(record: UnknownRecord | undefined, key: string): string | null {
  return record ? toStringOrNull(record[key]) : null;
}

export function getNumber(record: UnknownRecord | undefined, key: string): number | null {
  const value = record?.[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function getBoolean(record: UnknownRecord | undefined, key: string): boolean {
  return record?.[key] === true;
}

export function getRecord(
  record: UnknownRecord | undefined,
  key: string,
): UnknownRecord | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

export function getArray(record: UnknownRecord | undefined, key: string): unknown[] {
  const value = record?.[key];
  return Array.isArray(value) ? value : [];
}

export function getRecords(record: UnknownRecord | undefined, key: string): UnknownRecord[] {
  return getArray(record, key).filter(isRecord);
}

/** Reads a nested string, e.g. `getPath(app, ["source", "public_name"])`. */
export function getPath(record: UnknownRecord | undefined, path: string[]): string | null {
  let current: unknown = record;
  for (const key of path) {
    if (!isRecord(current)) return null;
    current = current[key];
  }
  return toStringOrNull(current);
}

/** Drops keys whose value is null or undefined. */
export function compact(record: UnknownRecord): UnknownRecord {
  return Object.fromEntries(
    Object.entries(record).filter(
      ([, value]) => value !== null && value !== undefined,
    ),
  );
}
