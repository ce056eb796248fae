import * as path from 'node:path';
import type { PathKind } from '../types.js';

/**
 * Extensions scored by the default maintainability oracle.
 */
export const DEFAULT_SOURCE_EXTENSIONS: readonly string[] = [
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
];

const DEFAULT_EXTENSION_SET: ReadonlySet<string> = new Set(DEFAULT_SOURCE_EXTENSIONS);

export function toExtensionSet(extensions: Iterable<string>): ReadonlySet<string> {
  const set = new Set<string>();
  for (const raw of extensions) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    set.add(trimmed.startsWith('.') ? trimmed : `.${trimmed}`);
  }
  return set;
}

export function hasSourceExtension(
  filePath: string,
  extensions: ReadonlySet<string> = DEFAULT_EXTENSION_SET
): boolean {
  const ext = path.posix.extname(filePath);
  return ext.length > 0 && extensions.has(ext);
}

/**
 * A path whose final component carries a source extension is a module;
 * anything else is a package.
 */
export function classifyPath(
  filePath: string,
  extensions: ReadonlySet<string> = DEFAULT_EXTENSION_SET
): PathKind {
  return hasSourceExtension(filePath, extensions) ? 'module' : 'package';
}
