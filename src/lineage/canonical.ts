import { createHash } from "node:crypto";

export const LINEAGE_HASH_LENGTH = 12;

/** Top-level keys that describe a record rather than configure training. */
export const DEFAULT_EXCLUDED_KEYS: readonly string[] = ["metadata", "lineage_hash", "generated_at"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Serialize a value to canonical JSON: object keys sorted at every depth,
 * array order kept, undefined members dropped. Throws on values that have
 * no stable serialization (NaN, Infinity, functions, class instances).
 */
export function canonicalJson(value: unknown, at = "$"): string {
  if (value === null) return "null";

  switch (typeof value) {
    case "boolean":
      return value ? "true" : "false";
    case "string":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) throw new Error(`Non-finite number at ${at}`);
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw new Error(`Unsupported ${typeof value} at ${at}`);
  }

  if (Array.isArray(value)) {
    const items = value.map((item, i) => {
      if (item === undefined) throw new Error(`Undefined array element at ${at}[${i}]`);
      return canonicalJson(item, `${at}[${i}]`);
    });
    return `[${items.join(",")}]`;
  }

  if (!isPlainObject(value)) {
    throw new Error(`Unsupported object at ${at}`);
  }

  const members = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key], `${at}.${key}`)}`);
  return `{${members.join(",")}}`;
}

export function stripExcluded(
  record: Record<string, unknown>,
  excludeKeys: readonly string[] = DEFAULT_EXCLUDED_KEYS,
): Record<string, unknown> {
  const excluded = new Set(excludeKeys);
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!excluded.has(key)) result[key] = value;
  }
  return result;
}

/** Deterministic short fingerprint of a unit's training configuration. */
export function lineageHash(
  record: Record<string, unknown>,
  excludeKeys: readonly string[] = DEFAULT_EXCLUDED_KEYS,
): string {
  const canonical = canonicalJson(stripExcluded(record, excludeKeys));
  return createHash("sha256").update(canonical).digest("hex").slice(0, LINEAGE_HASH_LENGTH);
}
