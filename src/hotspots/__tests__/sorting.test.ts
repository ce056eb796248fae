import { describe, it, expect } from 'vitest';
import { sortMetrics } from '../sorting.js';
import { createPathMetrics } from '../aggregator.js';
import { toHotspotRow } from '../hotspot_index.js';
import type { HotspotRow, PathKind } from '../../types.js';

function row(path: string, kind: PathKind, maintainability: number, changes: number): HotspotRow {
  return toHotspotRow({ ...createPathMetrics(path, kind), maintainability, changes });
}

describe('sortMetrics', () => {
  const rows = [
    row('b.ts', 'module', 50, 5), // index 10
    row('a', 'package', 20, 1), // index 5
    row('a/x.ts', 'module', 20, 4), // index 20
    row('c.ts', 'module', 100, 5), // index 5
  ];

  it('sorts numeric fields descending with ties broken by path', () => {
    expect(sortMetrics(rows, 'hotspotIndex').map((r) => r.path)).toEqual(['a/x.ts', 'b.ts', 'a', 'c.ts']);
    expect(sortMetrics(rows, 'changes').map((r) => r.path)).toEqual(['b.ts', 'c.ts', 'a/x.ts', 'a']);
  });

  it('sorts path ascending', () => {
    expect(sortMetrics(rows, 'path').map((r) => r.path)).toEqual(['a', 'a/x.ts', 'b.ts', 'c.ts']);
  });

  it('sorts kind ascending, then path', () => {
    expect(sortMetrics(rows, 'kind').map((r) => r.path)).toEqual(['a/x.ts', 'b.ts', 'c.ts', 'a']);
  });

  it('puts NaN last', () => {
    const broken = row('z.ts', 'module', 0, 0);
    expect(sortMetrics([broken, ...rows], 'hotspotIndex').map((r) => r.path).at(-1)).toBe('z.ts');
  });

  it('does not mutate its input', () => {
    const copy = [...rows];
    sortMetrics(rows, 'path');
    expect(rows).toEqual(copy);
  });
});
