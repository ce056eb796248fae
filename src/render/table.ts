/**
 * @fileoverview Aligned text table for terminals
 */

import { SORT_CONVENTION } from '../hotspots/sorting.js';
import { UNSET_MAINTAINABILITY, type HotspotRow, type OutputField } from '../types.js';
import { fieldValue } from './fields.js';

const HEADERS: Record<OutputField, string> = {
  path: 'Path',
  kind: 'Kind',
  maintainability: 'Maintainability',
  changes: 'Changes',
  hotspotIndex: 'Hotspot Index',
  linesOfCode: 'LOC',
  commentsPercentage: 'Comments %',
  cyclomaticComplexity: 'Complexity',
  halsteadVolume: 'Volume',
};

const INTEGER_FIELDS: ReadonlySet<OutputField> = new Set<OutputField>(['changes', 'linesOfCode', 'cyclomaticComplexity']);

export function formatCell(row: HotspotRow, field: OutputField): string {
  const value = fieldValue(row, field);
  if (typeof value === 'string') return value;
  if (field === 'maintainability' && value === UNSET_MAINTAINABILITY) return 'n/a';
  if (!Number.isFinite(value)) return String(value);
  return INTEGER_FIELDS.has(field) ? String(value) : value.toFixed(2);
}

/**
 * Lay out headers and rows in padded columns separated by ` | `.
 */
export function formatTable(headers: readonly string[], rows: readonly string[][]): string[] {
  const widths = headers.map((header, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(header.length, maxRowWidth);
  });

  const lines = [
    headers.map((header, i) => header.padEnd(widths[i] ?? 0)).join(' | ').trimEnd(),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
  ];
  for (const row of rows) {
    lines.push(row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ').trimEnd());
  }
  return lines;
}

export function renderTable(rows: readonly HotspotRow[], fields: readonly OutputField[]): string {
  if (rows.length === 0) {
    return 'No hotspots found.\n';
  }

  const lines = formatTable(
    fields.map((field) => HEADERS[field]),
    rows.map((row) => fields.map((field) => formatCell(row, field)))
  );
  lines.push('', `${rows.length} rows, sorted ${SORT_CONVENTION}`);
  return lines.join('\n') + '\n';
}
