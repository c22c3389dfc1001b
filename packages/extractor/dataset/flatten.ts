import type { ExtractedRecord, FieldValue } from "../types";

export type FlatValue = string | number | boolean | null;

/**
 * Flatten nested objects into dot-joined keys. Arrays stay leaves and are
 * stored as JSON text, as are empty objects.
 *
 *   { patient: { age: { num: 4 } }, top: ["a"] }
 *   -> { "patient.age.num": 4, top: '["a"]' }
 */
export function flattenRecord(record: ExtractedRecord, separator = "."): Record<string, FlatValue> {
  const flat: Record<string, FlatValue> = {};

  const visit = (value: FieldValue, path: string) => {
    if (Array.isArray(value)) {
      flat[path] = JSON.stringify(value);
    } else if (value !== null && typeof value === "object") {
      const entries = Object.entries(value);
      if (entries.length === 0) {
        flat[path] = "{}";
        return;
      }
      for (const [key, child] of entries) {
        visit(child, `${path}${separator}${key}`);
      }
    } else {
      flat[path] = value;
    }
  };

  for (const [key, value] of Object.entries(record)) {
    visit(value, key);
  }

  return flat;
}

/**
 * Union of keys across records in first-seen order.
 */
export function collectColumns(rows: Record<string, FlatValue>[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}
