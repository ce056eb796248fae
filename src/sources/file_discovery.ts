/**
 * @fileoverview Source file discovery
 *
 * Recursive walk of the analysed directory returning every file with a
 * source extension, relative to that directory, minus excluded paths.
 */

import { glob } from 'glob';
import { isExcluded, type ExclusionSet } from '../hotspots/exclusion.js';
import { normalizePath } from '../utils/paths.js';
import { logDebug } from '../telemetry/logger.js';

export const DEFAULT_DISCOVERY_IGNORES: readonly string[] = ['**/node_modules/**', '**/.git/**'];

export interface DiscoveryOptions {
  extensions: ReadonlySet<string>;
  excluded?: ExclusionSet;
  ignore?: readonly string[];
}

export async function discoverSourceFiles(
  directory: string,
  options: DiscoveryOptions
): Promise<string[]> {
  const patterns = Array.from(options.extensions, (ext) => `**/*${ext}`);
  if (patterns.length === 0) return [];

  const files = await glob(patterns, {
    cwd: directory,
    ignore: [...(options.ignore ?? DEFAULT_DISCOVERY_IGNORES)],
    absolute: false,
    follow: false,
    nodir: true,
    posix: true,
  });

  const excluded = options.excluded ?? new Set<string>();
  const discovered = Array.from(new Set(files.map(normalizePath)))
    .filter((file) => !isExcluded(file, excluded))
    .sort();

  logDebug('[debt-hotspots] Discovered source files', {
    directory,
    matched: files.length,
    kept: discovered.length,
  });

  return discovered;
}
