/**
 * @fileoverview Row rendering entry point
 */

import type { HotspotRow, OutputFormat } from '../types.js';
import { renderCsv } from './csv.js';
import { renderJson } from './json.js';
import { renderTable } from './table.js';
import { selectFields } from './fields.js';

export interface RenderOptions {
  /** Add the lines of code, comments, complexity and volume columns */
  details?: boolean;
}

export function renderMetrics(
  rows: readonly HotspotRow[],
  format: OutputFormat,
  options: RenderOptions = {}
): string {
  const fields = selectFields(options.details ?? false);
  switch (format) {
    case 'csv':
      return renderCsv(rows, fields);
    case 'json':
      return renderJson(rows, fields);
    case 'table':
      return renderTable(rows, fields);
  }
}

export { renderCsv, parseMetricsCsv, splitCsvRecords } from './csv.js';
export { renderJson, toJsonRows, type JsonRow } from './json.js';
export { renderTable, formatTable, formatCell } from './table.js';
export { selectFields, fieldValue } from './fields.js';
