/**
 * @fileoverview Hotspot index
 *
 * Hotspots are paths with frequent changes AND poor maintainability: this is
 * where refactoring pays off first.
 *
 * Formula: HotspotIndex = Changes / (Maintainability / 100)
 *
 * A path changed 3 times with maintainability 30 scores 10; the same churn at
 * maintainability 100 scores 3.
 */

import { UNSET_MAINTAINABILITY, type HotspotRow, type PathMetrics } from '../types.js';

/**
 * Compute the hotspot index for one entry.
 *
 * The division is deliberately unguarded. Maintainability is floored during
 * aggregation, so 0 only shows up when a caller bypasses the floor; it then
 * yields `Infinity` (or `NaN` with zero changes). An unset maintainability
 * yields 0.
 */
export function computeHotspotIndex(metrics: Pick<PathMetrics, 'changes' | 'maintainability'>): number {
  return metrics.changes / (metrics.maintainability / 100);
}

/**
 * True when no measured file ever reached this path, typically a file that
 * was changed and later deleted, or one that only appears in the change log.
 */
export function isDeleted(metrics: Pick<PathMetrics, 'maintainability'>): boolean {
  return metrics.maintainability === UNSET_MAINTAINABILITY;
}

export function toHotspotRow(metrics: PathMetrics): HotspotRow {
  return { ...metrics, hotspotIndex: computeHotspotIndex(metrics) };
}
