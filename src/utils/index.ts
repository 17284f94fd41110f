/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// =============================================================================
// Object Helpers
// =============================================================================

/**
 * Narrow an unknown value to a plain string-keyed record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON.stringify with object keys sorted, so equal values always serialize
 * to the same text.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return "[" + value.map(stableStringify).join(",") + "]";
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return "{" + entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",") + "}";
}
