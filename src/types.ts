/**
 * @fileoverview Shared types for hotspot analysis
 *
 * A run produces one {@link PathMetrics} entry per path that is either a
 * measured source file or an ancestor directory of one. Entries are keyed by
 * normalised POSIX path; the directory tree is never built explicitly.
 */

// ============================================================================
// PATH METRICS
// ============================================================================

/**
 * `module` is a leaf source file, `package` an aggregation node (any
 * directory, including the root).
 */
export type PathKind = 'module' | 'package';

/**
 * Maintainability of a path no measurement has reached yet.
 * Aggregates through `Math.min` to the first real score and yields a hotspot
 * index of 0.
 */
export const UNSET_MAINTAINABILITY = Number.POSITIVE_INFINITY;

/**
 * Aggregated metrics for one path.
 */
export interface PathMetrics {
  /** Normalised relative path, the map key */
  path: string;

  kind: PathKind;

  /**
   * Minimum maintainability (0-100] of every measured file at or below this
   * path, or {@link UNSET_MAINTAINABILITY}.
   */
  maintainability: number;

  /** Sum of change counts of every file at or below this path */
  changes: number;

  /** Sum of source lines of code */
  linesOfCode: number;

  /** Comment lines as a percentage of source lines, weighted by lines of code */
  commentsPercentage: number;

  /** Highest per-file cyclomatic complexity */
  cyclomaticComplexity: number;

  /** Highest per-file Halstead volume */
  halsteadVolume: number;
}

/**
 * Per-file statistics an oracle may report next to the score.
 */
export interface MeasurementDetails {
  linesOfCode: number;
  commentsPercentage: number;
  cyclomaticComplexity: number;
  halsteadVolume: number;
}

/**
 * Maintainability pass input: one per surviving source file.
 */
export interface FileMeasurement {
  path: string;
  score: number;
  details?: MeasurementDetails;
}

/**
 * Change-count pass input: one per file seen in the change log.
 */
export interface FileChange {
  path: string;
  count: number;
}

export type PathMetricsMap = Map<string, PathMetrics>;

// ============================================================================
// OUTPUT FIELDS
// ============================================================================

export const BASE_FIELDS = [
  'path',
  'kind',
  'maintainability',
  'changes',
  'hotspotIndex',
] as const;

export const DETAIL_FIELDS = [
  'linesOfCode',
  'commentsPercentage',
  'cyclomaticComplexity',
  'halsteadVolume',
] as const;

export const OUTPUT_FIELDS = [...BASE_FIELDS, ...DETAIL_FIELDS] as const;

export type OutputField = (typeof OUTPUT_FIELDS)[number];

export function isOutputField(value: string): value is OutputField {
  return OUTPUT_FIELDS.some((field) => field === value);
}

export const OUTPUT_FORMATS = ['csv', 'table', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * A rendered row: {@link PathMetrics} plus the derived hotspot index.
 */
export interface HotspotRow extends PathMetrics {
  hotspotIndex: number;
}
