/**
 * @fileoverview Argument helpers shared by the commands
 *
 * Commands parse their own flags strictly with `node:util` `parseArgs`; the
 * global flags are accepted everywhere so they can appear after the command.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createError } from './errors.js';
import { getErrorMessage } from '../utils/errors.js';

export const GLOBAL_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  verbose: { type: 'boolean' },
  json: { type: 'boolean' },
} as const;

/**
 * Run a `parseArgs` call, turning unknown or malformed flags into an
 * invalid-argument error.
 */
export function parseCommandArgs<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('EINVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parseIntegerArg(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw createError('EINVALID_ARGUMENT', `${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * `--extensions .ts,tsx` → `['.ts', 'tsx']`; dots are added later by the
 * extension set.
 */
export function parseListArg(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Resolve the directory positional (default: cwd) and check it exists.
 */
export async function resolveDirectoryArg(positionals: readonly string[], command: string): Promise<string> {
  if (positionals.length > 1) {
    throw createError('EINVALID_ARGUMENT', `${command} takes one directory, got ${positionals.length}`);
  }

  const directory = path.resolve(positionals[0] ?? process.cwd());
  const stat = await fs.stat(directory).catch(() => null);
  if (!stat?.isDirectory()) {
    throw createError('EINVALID_ARGUMENT', `Not a directory: ${directory}`, { directory });
  }
  return directory;
}

export function requireStringArg(value: string | undefined, flag: string, command: string): string {
  if (value === undefined || value.trim() === '') {
    throw createError('EINVALID_ARGUMENT', `${command} requires ${flag} <file>`);
  }
  return value;
}
