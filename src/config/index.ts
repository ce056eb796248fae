/**
 * @fileoverview Hotspot analysis configuration
 *
 * Resolution order (later wins):
 * 1. {@link DEFAULT_HOTSPOT_CONFIG}
 * 2. `.debt-hotspots.yaml` in the analysed directory (optional)
 * 3. Command-line flags
 *
 * Every value is validated before any file is read, so a bad `since` date or
 * sort field fails the run up front.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_SOURCE_EXTENSIONS } from '../hotspots/path_classifier.js';
import { MINIMUM_MAINTAINABILITY } from '../hotspots/aggregator.js';
import {
  OUTPUT_FIELDS,
  OUTPUT_FORMATS,
  isOutputField,
  isOutputFormat,
  type OutputField,
  type OutputFormat,
} from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export const CONFIG_FILENAME = '.debt-hotspots.yaml';

export interface HotspotConfig {
  /** Paths (files or directories) removed from both passes */
  excludePaths: string[];
  /** Only count changes after this date (`YYYY-MM-DD`) */
  since?: string;
  /** Keep entries no measured file reached */
  includeDeleted: boolean;
  sortField: OutputField;
  format: OutputFormat;
  /** Extensions treated as source files */
  extensions: string[];
  /** Lowest stored maintainability score */
  maintainabilityFloor: number;
  /** Files scored in parallel */
  concurrency: number;
  /** Include lines of code, comments, complexity and volume columns */
  details: boolean;
  /** Show a progress bar while scoring (TTY only) */
  progress: boolean;
}

export type HotspotConfigOverrides = Partial<HotspotConfig>;

const MAX_DEFAULT_CONCURRENCY = 8;

function defaultConcurrency(): number {
  return Math.max(1, Math.min(os.availableParallelism(), MAX_DEFAULT_CONCURRENCY));
}

export const DEFAULT_HOTSPOT_CONFIG: HotspotConfig = {
  excludePaths: [],
  since: undefined,
  includeDeleted: false,
  sortField: 'hotspotIndex',
  format: 'table',
  extensions: [...DEFAULT_SOURCE_EXTENSIONS],
  maintainabilityFloor: MINIMUM_MAINTAINABILITY,
  concurrency: defaultConcurrency(),
  details: false,
  progress: true,
};

// ============================================================================
// SCHEMAS
// ============================================================================

const SINCE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const SINCE_ERROR = "Invalid date format. Use 'YYYY-MM-DD'";

const HotspotConfigSchema = z
  .object({
    excludePaths: z.array(z.string()),
    since: z.string().optional(),
    includeDeleted: z.boolean(),
    sortField: z.enum(OUTPUT_FIELDS),
    format: z.enum(OUTPUT_FORMATS),
    extensions: z.array(z.string().min(1)).min(1),
    maintainabilityFloor: z.number().positive().max(100),
    concurrency: z.number().int().positive(),
    details: z.boolean(),
    progress: z.boolean(),
  })
  .strict();

const ConfigFileSchema = HotspotConfigSchema.partial().strict();

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Validate a `since` date. Accepts only real calendar dates in ISO
 * `YYYY-MM-DD` form and returns the value unchanged.
 *
 * @throws ConfigurationError on any other input
 */
export function parseSince(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;

  const match = SINCE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigurationError('since', SINCE_ERROR);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new ConfigurationError('since', SINCE_ERROR);
  }

  return match[0];
}

export function parseSortField(value: string): OutputField {
  if (!isOutputField(value)) {
    throw new ConfigurationError('sortField', `Unknown sort field "${value}". Use one of: ${OUTPUT_FIELDS.join(', ')}`);
  }
  return value;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new ConfigurationError('format', `Unknown format "${value}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

/**
 * Merge overrides onto a base configuration and validate the result.
 * Undefined override values leave the base value in place.
 */
export function resolveConfig(
  overrides: HotspotConfigOverrides = {},
  base: HotspotConfig = DEFAULT_HOTSPOT_CONFIG
): HotspotConfig {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = HotspotConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const parameter = String(parsed.error.issues[0]?.path[0] ?? 'config');
    throw new ConfigurationError(parameter, describeIssues(parsed.error));
  }

  return { ...parsed.data, since: parseSince(parsed.data.since) };
}

/**
 * Read `.debt-hotspots.yaml` from a directory. A missing file yields an
 * empty override set.
 */
export async function loadConfigFile(directory: string): Promise<HotspotConfigOverrides> {
  const filePath = path.join(directory, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let document: unknown;
  try {
    document = YAML.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('config', `${CONFIG_FILENAME} is not valid YAML: ${message}`);
  }
  if (document === null || document === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError('config', `${CONFIG_FILENAME}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Defaults, then the directory's config file, then explicit overrides.
 */
export async function loadHotspotConfig(
  directory: string,
  overrides: HotspotConfigOverrides = {}
): Promise<HotspotConfig> {
  const fileConfig = await loadConfigFile(directory);
  const withFile = resolveConfig(fileConfig);
  return resolveConfig(overrides, withFile);
}
