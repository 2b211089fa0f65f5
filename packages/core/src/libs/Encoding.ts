function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Canonical JSON encoding for hashing game states and transcript entries.
 * Object keys are sorted, undefined members dropped, no whitespace.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (!isPlainObject(value)) return value;

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      if (value[key] !== undefined) sorted[key] = value[key];
    }
    return sorted;
  });
}
