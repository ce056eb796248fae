import type { HotspotRow, OutputField } from '../types.js';
import { fieldValue } from './fields.js';

export type JsonRow = Partial<Record<OutputField, string | number | null>>;

/**
 * Rows as plain objects with only the selected fields. Non-finite numbers
 * (unset maintainability, an unguarded hotspot index) become `null`.
 */
export function toJsonRows(rows: readonly HotspotRow[], fields: readonly OutputField[]): JsonRow[] {
  return rows.map((row) => {
    const out: JsonRow = {};
    for (const field of fields) {
      const value = fieldValue(row, field);
      out[field] = typeof value === 'number' && !Number.isFinite(value) ? null : value;
    }
    return out;
  });
}

export function renderJson(rows: readonly HotspotRow[], fields: readonly OutputField[]): string {
  return JSON.stringify(toJsonRows(rows, fields), null, 2) + '\n';
}
