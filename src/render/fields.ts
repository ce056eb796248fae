import { BASE_FIELDS, OUTPUT_FIELDS, type HotspotRow, type OutputField } from '../types.js';

export function selectFields(details: boolean): readonly OutputField[] {
  return details ? OUTPUT_FIELDS : BASE_FIELDS;
}

export function fieldValue(row: HotspotRow, field: OutputField): string | number {
  switch (field) {
    case 'path':
      return row.path;
    case 'kind':
      return row.kind;
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
  }
}
