export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const prev = result[key];
      result[key] = deepMerge(isRecord(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}
