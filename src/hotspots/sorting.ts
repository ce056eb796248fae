import type { HotspotRow, OutputField } from '../types.js';

/**
 * Text fields sort ascending; numeric fields sort descending so the biggest
 * hotspot, churn or maintainability comes first. Ties fall back to path.
 */
export const SORT_CONVENTION = 'path/kind ascending, numeric fields descending';

const ASCENDING_FIELDS: ReadonlySet<OutputField> = new Set<OutputField>(['path', 'kind']);

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareDescending(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    if (aNaN && bNaN) return 0;
    return aNaN ? 1 : -1;
  }
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

export function sortMetrics(rows: readonly HotspotRow[], field: OutputField): HotspotRow[] {
  const sorted = [...rows];

  sorted.sort((a, b) => {
    let result: number;
    if (ASCENDING_FIELDS.has(field)) {
      result = field === 'kind' ? compareText(a.kind, b.kind) : 0;
    } else {
      result = compareDescending(numericField(a, field), numericField(b, field));
    }
    return result !== 0 ? result : compareText(a.path, b.path);
  });

  return sorted;
}

function numericField(row: HotspotRow, field: OutputField): number {
  switch (field) {
    case 'maintainability':
      return row.maintainability;
    case 'changes':
      return row.changes;
    case 'hotspotIndex':
      return row.hotspotIndex;
    case 'linesOfCode':
      return row.linesOfCode;
    case 'commentsPercentage':
      return row.commentsPercentage;
    case 'cyclomaticComplexity':
      return row.cyclomaticComplexity;
    case 'halsteadVolume':
      return row.halsteadVolume;
    case 'path':
    case 'kind':
      return 0;
  }
}
