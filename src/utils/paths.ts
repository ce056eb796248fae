/**
 * @fileoverview Path normalisation
 *
 * Every path that becomes a metrics key goes through {@link normalizePath}
 * so that `a/b`, `a/b/`, `./a/b` and `a\\b` name the same entry. Whitespace is
 * part of a file name and is kept.
 */

import * as path from 'node:path';

export const RELATIVE_ROOT = '.';

export function normalizePath(value: string): string {
  const slashed = value.replace(/\\/g, '/');
  if (slashed.length === 0) return RELATIVE_ROOT;

  const normalized = path.posix.normalize(slashed);
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1);
  }
  return normalized;
}
