import { describe, it, expect } from 'vitest';
import { selectMetrics } from '../selector.js';
import { createPathMetrics } from '../aggregator.js';

describe('selectMetrics', () => {
  const measured = { ...createPathMetrics('a.ts', 'module'), maintainability: 55 };
  const deleted = { ...createPathMetrics('gone.ts', 'module'), changes: 4 };
  const root = { ...createPathMetrics('.', 'package'), maintainability: 55 };

  it('drops unmeasured entries by default', () => {
    expect(selectMetrics([root, deleted, measured]).map((m) => m.path)).toEqual(['.', 'a.ts']);
  });

  it('keeps every entry in input order when deleted entries are requested', () => {
    expect(selectMetrics([root, deleted, measured], true).map((m) => m.path)).toEqual([
      '.',
      'gone.ts',
      'a.ts',
    ]);
  });
});
