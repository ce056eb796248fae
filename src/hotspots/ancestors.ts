import * as path from 'node:path';
import { normalizePath } from '../utils/paths.js';

/**
 * Expand a path into itself followed by every ancestor up to the root
 * sentinel (`.` for relative paths, `/` for absolute ones).
 *
 * Pure string manipulation: ancestors need not exist on disk. Each level
 * appears exactly once.
 *
 * @example
 * expandAncestors('a/b/c.ts') // ['a/b/c.ts', 'a/b', 'a', '.']
 */
export function expandAncestors(filePath: string): string[] {
  let current = normalizePath(filePath);
  const chain = [current];

  while (true) {
    const parent = path.posix.dirname(current);
    if (parent === current) break;
    chain.push(parent);
    current = parent;
  }

  return chain;
}
