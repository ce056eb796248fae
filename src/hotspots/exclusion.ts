/**
 * @fileoverview Exclusion filter
 *
 * A path is excluded when it, or any of its ancestors, is in the excluded
 * set. Containment is decided per path segment: excluding `a/b` excludes
 * `a/b/x.ts` but leaves `a/bc/x.ts` alone.
 */

import * as path from 'node:path';
import { expandAncestors } from './ancestors.js';
import { normalizePath } from '../utils/paths.js';

export type ExclusionSet = ReadonlySet<string>;

export function isExcluded(filePath: string, excluded: ExclusionSet): boolean {
  if (excluded.size === 0) return false;
  return expandAncestors(filePath).some((candidate) => excluded.has(candidate));
}

/**
 * Normalise user-supplied exclusions. Absolute paths inside `baseDir` are
 * rebased so they compare against the relative keys the pipeline produces.
 */
export function createExclusionSet(paths: Iterable<string>, baseDir?: string): ExclusionSet {
  const set = new Set<string>();
  for (const entry of paths) {
    const raw = entry.trim();
    if (!raw) continue;
    set.add(rebase(raw, baseDir));
  }
  return set;
}

function rebase(raw: string, baseDir: string | undefined): string {
  const normalized = normalizePath(raw);
  if (!baseDir || !path.isAbsolute(raw)) return normalized;

  const relative = path.relative(path.resolve(baseDir), path.resolve(raw));
  if (relative.split(path.sep)[0] === '..' || path.isAbsolute(relative)) {
    return normalized;
  }
  return normalizePath(relative);
}
