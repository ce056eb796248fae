/**
 * @fileoverview Metrics aggregation over the implicit path tree
 *
 * Every file-level input is applied to the file itself and to each of its
 * ancestors (see {@link expandAncestors}). Combination rules per level:
 *
 * - maintainability: min (a package is only as good as its worst module)
 * - changes: sum (churn of a directory is the churn of everything inside it)
 * - lines of code: sum
 * - comments percentage: average weighted by lines of code
 * - cyclomatic complexity, Halstead volume: max
 *
 * Both passes are additive. Applying the same input twice counts it twice.
 */

import { expandAncestors } from './ancestors.js';
import { classifyPath, DEFAULT_SOURCE_EXTENSIONS, toExtensionSet } from './path_classifier.js';
import { RELATIVE_ROOT, normalizePath } from '../utils/paths.js';
import {
  UNSET_MAINTAINABILITY,
  type FileChange,
  type FileMeasurement,
  type MeasurementDetails,
  type PathKind,
  type PathMetrics,
  type PathMetricsMap,
} from '../types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Lowest maintainability a file can be stored with. A true 0 would turn the
 * hotspot index into a division by zero and dominate every ranking.
 */
export const MINIMUM_MAINTAINABILITY = 0.01;

export interface AggregatorOptions {
  /** Root sentinel seeded before any pass. Default: `.` */
  root?: string;
  /** Floor applied to every score. Default: {@link MINIMUM_MAINTAINABILITY} */
  floor?: number;
  /** Extensions that mark a path as a module */
  extensions?: ReadonlySet<string>;
}

interface ResolvedOptions {
  root: string;
  floor: number;
  extensions: ReadonlySet<string>;
}

const DEFAULT_EXTENSION_SET = toExtensionSet(DEFAULT_SOURCE_EXTENSIONS);

function resolveOptions(options: AggregatorOptions = {}): ResolvedOptions {
  return {
    root: normalizePath(options.root ?? RELATIVE_ROOT),
    floor: options.floor ?? MINIMUM_MAINTAINABILITY,
    extensions: options.extensions ?? DEFAULT_EXTENSION_SET,
  };
}

// ============================================================================
// MAP OPERATIONS
// ============================================================================

export function createPathMetrics(path: string, kind: PathKind): PathMetrics {
  return {
    path,
    kind,
    maintainability: UNSET_MAINTAINABILITY,
    changes: 0,
    linesOfCode: 0,
    commentsPercentage: 0,
    cyclomaticComplexity: 0,
    halsteadVolume: 0,
  };
}

/**
 * Create a metrics map seeded with the root entry, so the root is reported
 * even when no file is discovered.
 */
export function createMetricsMap(options?: AggregatorOptions): PathMetricsMap {
  const { root } = resolveOptions(options);
  const map: PathMetricsMap = new Map();
  map.set(root, createPathMetrics(root, 'package'));
  return map;
}

function fetchOrCreate(
  map: PathMetricsMap,
  path: string,
  extensions: ReadonlySet<string>
): PathMetrics {
  const existing = map.get(path);
  if (existing) return existing;
  const created = createPathMetrics(path, classifyPath(path, extensions));
  map.set(path, created);
  return created;
}

export function clampScore(score: number, floor: number = MINIMUM_MAINTAINABILITY): number {
  return Math.max(score, floor);
}

function foldDetails(target: PathMetrics, details: MeasurementDetails): void {
  const totalLines = target.linesOfCode + details.linesOfCode;
  if (totalLines > 0) {
    target.commentsPercentage =
      (target.commentsPercentage * target.linesOfCode +
        details.commentsPercentage * details.linesOfCode) /
      totalLines;
  }
  target.linesOfCode = totalLines;
  target.cyclomaticComplexity = Math.max(target.cyclomaticComplexity, details.cyclomaticComplexity);
  target.halsteadVolume = Math.max(target.halsteadVolume, details.halsteadVolume);
}

/**
 * Fold maintainability measurements into the map: floor each score, then
 * take the minimum at the file and at every ancestor.
 */
export function applyMaintainability(
  map: PathMetricsMap,
  measurements: Iterable<FileMeasurement>,
  options?: AggregatorOptions
): void {
  const { floor, extensions } = resolveOptions(options);

  for (const measurement of measurements) {
    const score = clampScore(measurement.score, floor);
    for (const ancestor of expandAncestors(measurement.path)) {
      const entry = fetchOrCreate(map, ancestor, extensions);
      entry.maintainability = Math.min(entry.maintainability, score);
      if (measurement.details) {
        foldDetails(entry, measurement.details);
      }
    }
  }
}

/**
 * Fold change counts into the map: add each count to the file and to every
 * ancestor.
 */
export function applyChanges(
  map: PathMetricsMap,
  changes: Iterable<FileChange>,
  options?: AggregatorOptions
): void {
  const { extensions } = resolveOptions(options);

  for (const change of changes) {
    for (const ancestor of expandAncestors(change.path)) {
      fetchOrCreate(map, ancestor, extensions).changes += change.count;
    }
  }
}

// ============================================================================
// AGGREGATOR
// ============================================================================

/**
 * Owns the path → metrics map for one run.
 *
 * Single writer: callers gather measurements (possibly in parallel) and hand
 * them over in one call per pass.
 */
export class MetricsAggregator {
  private readonly metrics: PathMetricsMap;
  private readonly options: ResolvedOptions;

  constructor(options?: AggregatorOptions) {
    this.options = resolveOptions(options);
    this.metrics = createMetricsMap(this.options);
  }

  get root(): string {
    return this.options.root;
  }

  get size(): number {
    return this.metrics.size;
  }

  applyMaintainability(measurements: Iterable<FileMeasurement>): this {
    applyMaintainability(this.metrics, measurements, this.options);
    return this;
  }

  applyChanges(changes: Iterable<FileChange>): this {
    applyChanges(this.metrics, changes, this.options);
    return this;
  }

  get(path: string): PathMetrics | undefined {
    return this.metrics.get(normalizePath(path));
  }

  /** Entries in insertion order */
  entries(): PathMetrics[] {
    return Array.from(this.metrics.values());
  }
}
