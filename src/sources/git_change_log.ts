/**
 * @fileoverview Change-log oracle backed by `git log`
 *
 * `git log --name-only` prints one entry per file per commit, so a file's
 * number of entries is its change count. Paths are relative to the analysed
 * directory (`--relative`) and NUL terminated (`-z`), so names with spaces,
 * quotes or non-ASCII characters arrive unquoted.
 */

import { execa } from 'execa';
import { ChangeLogError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { normalizePath } from '../utils/paths.js';
import { hasSourceExtension } from '../hotspots/path_classifier.js';
import { isExcluded, type ExclusionSet } from '../hotspots/exclusion.js';
import { logDebug } from '../telemetry/logger.js';
import type { FileChange } from '../types.js';

export interface ChangeCountOptions {
  extensions: ReadonlySet<string>;
  excluded?: ExclusionSet;
}

export interface ChangeLogOptions extends ChangeCountOptions {
  /** ISO `YYYY-MM-DD`, already validated */
  since?: string;
}

export function buildGitLogArgs(since?: string): string[] {
  const args = ['log', '--name-only', '--relative', '-z', '--pretty=format:'];
  if (since) {
    args.push('--since', since);
  }
  args.push('--', '.');
  return args;
}

async function runGitLog(directory: string, since: string | undefined) {
  try {
    return await execa('git', buildGitLogArgs(since), {
      cwd: directory,
      reject: false,
    });
  } catch (error) {
    throw new ChangeLogError(directory, getErrorMessage(error));
  }
}

/**
 * Run `git log` in `directory` and return the changed paths, one entry per
 * file per commit. Duplicates are meaningful.
 *
 * @throws ChangeLogError when git cannot run or exits non-zero
 */
export async function readChangeLog(directory: string, since?: string): Promise<string[]> {
  const result = await runGitLog(directory, since);

  if (result.failed || result.exitCode !== 0) {
    const stderr = String(result.stderr ?? '').trim();
    throw new ChangeLogError(
      directory,
      stderr || `git log exited with code ${result.exitCode ?? 'unknown'}`,
      result.exitCode,
      stderr || undefined
    );
  }

  // Commit separators are NULs too; empty entries carry no name
  return String(result.stdout)
    .split('\0')
    .filter((name) => name.length > 0)
    .map(normalizePath);
}

/**
 * Count changes per file, dropping non-source and excluded paths.
 * Results keep first-seen order.
 */
export function countChanges(lines: Iterable<string>, options: ChangeCountOptions): FileChange[] {
  const excluded = options.excluded ?? new Set<string>();
  const counts = new Map<string, number>();

  for (const line of lines) {
    const file = normalizePath(line);
    if (!hasSourceExtension(file, options.extensions)) continue;
    if (isExcluded(file, excluded)) continue;
    counts.set(file, (counts.get(file) ?? 0) + 1);
  }

  return Array.from(counts, ([path, count]) => ({ path, count }));
}

export async function collectFileChanges(
  directory: string,
  options: ChangeLogOptions
): Promise<FileChange[]> {
  const lines = await readChangeLog(directory, options.since);
  const changes = countChanges(lines, options);
  logDebug('[debt-hotspots] Read change log', {
    directory,
    since: options.since,
    lines: lines.length,
    files: changes.length,
  });
  return changes;
}
