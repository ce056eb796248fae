import { describe, it, expect } from 'vitest';
import { computeHotspotIndex, isDeleted, toHotspotRow } from '../hotspot_index.js';
import { createPathMetrics } from '../aggregator.js';
import { UNSET_MAINTAINABILITY } from '../../types.js';

describe('computeHotspotIndex', () => {
  it('divides changes by maintainability as a fraction', () => {
    expect(computeHotspotIndex({ changes: 50, maintainability: 80 })).toBe(62.5);
  });

  it('is 0 without changes', () => {
    expect(computeHotspotIndex({ changes: 0, maintainability: 80 })).toBe(0);
  });

  it('is 0 for unset maintainability', () => {
    expect(computeHotspotIndex({ changes: 7, maintainability: UNSET_MAINTAINABILITY })).toBe(0);
  });

  it('does not guard a zero maintainability', () => {
    expect(computeHotspotIndex({ changes: 3, maintainability: 0 })).toBe(Number.POSITIVE_INFINITY);
    expect(computeHotspotIndex({ changes: 0, maintainability: 0 })).toBeNaN();
  });

  it('passes negative values through', () => {
    expect(computeHotspotIndex({ changes: -50, maintainability: 80 })).toBe(-62.5);
  });
});

describe('isDeleted', () => {
  it('is true only for unset maintainability', () => {
    expect(isDeleted({ maintainability: UNSET_MAINTAINABILITY })).toBe(true);
    expect(isDeleted({ maintainability: 0.01 })).toBe(false);
    expect(isDeleted({ maintainability: 100 })).toBe(false);
  });
});

describe('toHotspotRow', () => {
  it('adds the index without touching the metrics', () => {
    const metrics = { ...createPathMetrics('a', 'package'), maintainability: 40, changes: 2 };
    const row = toHotspotRow(metrics);
    expect(row).toEqual({ ...metrics, hotspotIndex: 5 });
    expect(metrics).not.toHaveProperty('hotspotIndex');
  });
});
