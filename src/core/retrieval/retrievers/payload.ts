/**
 * Payload helpers shared by the document-backed retrievers
 */

import type { SearchFilters } from "../../../types/index.js";

export function omitKeys(payload: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!keys.includes(key)) result[key] = value;
  }
  return result;
}

/** The `source` filter as a label, or `fallback` when absent */
export function sourceLabel(filters: SearchFilters | undefined, fallback: string): string {
  const value = filters?.source;
  if (value === undefined) return fallback;
  return Array.isArray(value) ? value.join("|") : String(value);
}
