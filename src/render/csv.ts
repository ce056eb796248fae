/**
 * @fileoverview CSV rendering and parsing
 *
 * Numbers are written at full precision with `String()`, so an unset
 * maintainability comes out as `Infinity` and reads back as one. Cells that
 * hold a comma, quote or line break are quoted (RFC 4180).
 */

import { InputFormatError } from '../core/errors.js';
import { BASE_FIELDS, isOutputField, type HotspotRow, type OutputField, type PathKind } from '../types.js';
import { fieldValue } from './fields.js';

const NEEDS_QUOTING = /[",\r\n]/;

function escapeCell(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(rows: readonly HotspotRow[], fields: readonly OutputField[]): string {
  const lines = [fields.join(',')];
  for (const row of rows) {
    lines.push(fields.map((field) => escapeCell(fieldValue(row, field))).join(','));
  }
  return lines.join('\n') + '\n';
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Split CSV text into records of raw cells. Quoted cells may span lines.
 */
export function splitCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let quoted = false;
  let index = 0;

  const endCell = (): void => {
    record.push(cell);
    cell = '';
  };
  const endRecord = (): void => {
    endCell();
    records.push(record);
    record = [];
  };

  while (index < text.length) {
    const char = text[index];

    if (quoted) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          cell += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        cell += char;
      }
      index++;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      endCell();
    } else if (char === '\n' || char === '\r') {
      endRecord();
      if (char === '\r' && text[index + 1] === '\n') index++;
    } else {
      cell += char;
    }
    index++;
  }

  if (quoted) {
    throw new InputFormatError('<csv>', 'unterminated quoted cell');
  }
  if (cell.length > 0 || record.length > 0) {
    endRecord();
  }

  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

function parseNumber(cell: string, field: OutputField, line: number): number {
  const value = cell.trim() === '' ? Number.NaN : Number(cell);
  if (Number.isNaN(value) && cell.trim() !== 'NaN') {
    throw new InputFormatError('<csv>', `line ${line}: "${cell}" is not a number (${field})`);
  }
  return value;
}

function parseKind(cell: string, line: number): PathKind {
  if (cell === 'module' || cell === 'package') return cell;
  throw new InputFormatError('<csv>', `line ${line}: unknown kind "${cell}"`);
}

/**
 * Read rows written by {@link renderCsv}. Detail columns are optional and
 * default to 0.
 *
 * @throws InputFormatError on unknown or missing columns and bad values
 */
export function parseMetricsCsv(text: string): HotspotRow[] {
  const [header, ...records] = splitCsvRecords(text);
  if (!header) return [];

  const fields: OutputField[] = [];
  for (const name of header) {
    if (!isOutputField(name)) {
      throw new InputFormatError('<csv>', `unknown column "${name}"`);
    }
    fields.push(name);
  }
  for (const required of BASE_FIELDS) {
    if (!fields.includes(required)) {
      throw new InputFormatError('<csv>', `missing column "${required}"`);
    }
  }

  return records.map((cells, offset) => {
    const line = offset + 2;
    if (cells.length !== fields.length) {
      throw new InputFormatError('<csv>', `line ${line}: expected ${fields.length} cells, got ${cells.length}`);
    }

    const row: HotspotRow = {
      path: '',
      kind: 'module',
      maintainability: 0,
      changes: 0,
      hotspotIndex: 0,
      linesOfCode: 0,
      commentsPercentage: 0,
      cyclomaticComplexity: 0,
      halsteadVolume: 0,
    };

    fields.forEach((field, i) => {
      const cell = cells[i] ?? '';
      switch (field) {
        case 'path':
          row.path = cell;
          break;
        case 'kind':
          row.kind = parseKind(cell, line);
          break;
        default:
          row[field] = parseNumber(cell, field, line);
      }
    });

    return row;
  });
}
