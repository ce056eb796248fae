import { isDeleted } from './hotspot_index.js';
import type { PathMetrics } from '../types.js';

/**
 * Drop entries no measured file ever reached, unless `includeDeleted` is set.
 * Keeps the input order.
 */
export function selectMetrics<T extends PathMetrics>(
  entries: Iterable<T>,
  includeDeleted = false
): T[] {
  const selected: T[] = [];
  for (const entry of entries) {
    if (includeDeleted || !isDeleted(entry)) {
      selected.push(entry);
    }
  }
  return selected;
}
