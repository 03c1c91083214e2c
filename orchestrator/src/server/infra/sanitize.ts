import { isRecord } from "@shared/utils/records";

const REDACTED = "[REDACTED]";

const SENSITIVE_KEY_PATTERN =
  /(authorization|cookie|password|pass|secret|token|api.?key|credential|set-cookie|proxy-authorization|x-api-key)/i;

const DEFAULT_MAX_STRING = 800;
const DEFAULT_MAX_DEPTH = 5;
const DEFAULT_MAX_ITEMS = 30;

export function redactString(value: string, max = DEFAULT_MAX_STRING): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max)}…(truncated ${value.length - max} chars)`;
}

export function sanitizeUnknown(
  value: unknown,
  options: { depth?: number; maxItems?: number; maxString?: number } = {},
): unknown {
  const depth = options.depth ?? DEFAULT_MAX_DEPTH;
  const maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
  const maxString = options.maxString ?? DEFAULT_MAX_STRING;

  if (value === null || value === undefined) return value;
  if (typeof value === "string") return redactString(value, maxString);
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return value;
  }

  if (value instanceof Error) {
    return sanitizeError(value);
  }

  if (depth <= 0) {
    return "[TRUNCATED_DEPTH]";
  }

  if (Array.isArray(value)) {
    const out: unknown[] = value.slice(0, maxItems).map((item) =>
      sanitizeUnknown(item, {
        depth: depth - 1,
        maxItems,
        maxString,
      }),
    );
    if (value.length > maxItems) {
      out.push(`[TRUNCATED_ITEMS ${value.length - maxItems}]`);
    }
    return out;
  }

  if (typeof value === "object") {
    const entries = Object.entries(value);
    const out: Record<string, unknown> = {};
    for (const [index, [key, entryValue]] of entries.entries()) {
      if (index >= maxItems) {
        out.__truncatedKeys = entries.length - maxItems;
        break;
      }

      if (SENSITIVE_KEY_PATTERN.test(key)) {
        out[key] = REDACTED;
        continue;
      }

      out[key] = sanitizeUnknown(entryValue, {
        depth: depth - 1,
        maxItems,
        maxString,
      });
    }
    return out;
  }

  return String(value);
}

export function sanitizeError(error: Error): Record<string, unknown> {
  const out: Record<string, unknown> = {
    name: error.name,
    message: redactString(error.message),
  };

  if ("status" in error && typeof error.status === "number") {
    out.status = error.status;
  }
  if ("url" in error && typeof error.url === "string") {
    out.url = error.url;
  }
  if ("details" in error && error.details !== undefined) {
    out.details = sanitizeUnknown(error.details);
  }
  if (error.cause !== undefined) out.cause = sanitizeUnknown(error.cause);
  if ("bodySnippet" in error && error.bodySnippet !== undefined) {
    out.body = REDACTED;
  }
  if (error.stack) out.stack = redactString(error.stack, 1200);
  return out;
}

export function sanitizeWebhookPayload(
  payload: unknown,
): Record<string, unknown> {
  const raw = sanitizeUnknown(payload, {
    depth: 4,
    maxItems: 20,
    maxString: 300,
  });
  return isRecord(raw) ? raw : { value: raw };
}
