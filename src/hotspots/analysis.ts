/**
 * @fileoverview Hotspot analysis pipeline
 *
 * discovery + exclusion
 *   ├─ (a) maintainability oracle per file, in parallel → FileMeasurement[]
 *   └─ (b) change log once → filtered counts          → FileChange[]
 * then both are folded sequentially into one metrics map seeded with the
 * root, and the selector / sorter shape the rows for presentation.
 */

import { MetricsAggregator } from './aggregator.js';
import { createExclusionSet, isExcluded, type ExclusionSet } from './exclusion.js';
import { toHotspotRow } from './hotspot_index.js';
import { toExtensionSet } from './path_classifier.js';
import { selectMetrics } from './selector.js';
import { sortMetrics } from './sorting.js';
import { discoverSourceFiles } from '../sources/file_discovery.js';
import { measureFiles } from '../sources/measure_files.js';
import { collectFileChanges, type ChangeLogOptions } from '../sources/git_change_log.js';
import type { MaintainabilityOracle } from '../sources/maintainability_index.js';
import type { HotspotConfig } from '../config/index.js';
import { logInfo } from '../telemetry/logger.js';
import type { FileChange, FileMeasurement, HotspotRow, PathMetrics } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface HotspotReport {
  /** Selected and sorted rows, ready to render */
  rows: HotspotRow[];
  /** Every entry of the metrics map, deleted ones included, in insertion order */
  metrics: PathMetrics[];
  stats: {
    filesMeasured: number;
    filesChanged: number;
    pathsTracked: number;
    durationMs: number;
  };
}

export interface AnalysisHooks {
  oracle?: MaintainabilityOracle;
  readChanges?: (directory: string, options: ChangeLogOptions) => Promise<FileChange[]>;
  /** Called once discovery knows how many files will be scored */
  onDiscovered?: (total: number) => void;
  onMeasured?: (completed: number, total: number, filePath: string) => void;
}

type CombineConfig = Pick<
  HotspotConfig,
  'excludePaths' | 'includeDeleted' | 'sortField' | 'extensions' | 'maintainabilityFloor'
>;

// ============================================================================
// COMBINATION
// ============================================================================

/**
 * Aggregate precomputed measurements and change counts. Excluded paths are
 * dropped from both inputs before anything reaches the map.
 */
export function combineMetrics(
  measurements: readonly FileMeasurement[],
  changes: readonly FileChange[],
  config: CombineConfig,
  excluded: ExclusionSet = createExclusionSet(config.excludePaths)
): { rows: HotspotRow[]; metrics: PathMetrics[] } {
  const aggregator = new MetricsAggregator({
    floor: config.maintainabilityFloor,
    extensions: toExtensionSet(config.extensions),
  });

  aggregator.applyMaintainability(measurements.filter((m) => !isExcluded(m.path, excluded)));
  aggregator.applyChanges(changes.filter((c) => !isExcluded(c.path, excluded)));

  const metrics = aggregator.entries();
  const rows = sortMetrics(
    selectMetrics(metrics, config.includeDeleted).map(toHotspotRow),
    config.sortField
  );

  return { rows, metrics };
}

// ============================================================================
// FULL RUN
// ============================================================================

/**
 * Score every source file under `directory`, count its changes from git and
 * aggregate both. Any read or git failure aborts the run.
 */
export async function runHotspotAnalysis(
  directory: string,
  config: HotspotConfig,
  hooks: AnalysisHooks = {}
): Promise<HotspotReport> {
  const startedAt = Date.now();
  const extensions = toExtensionSet(config.extensions);
  const excluded = createExclusionSet(config.excludePaths, directory);

  const files = await discoverSourceFiles(directory, { extensions, excluded });
  hooks.onDiscovered?.(files.length);
  logInfo('[debt-hotspots] Scoring source files', { directory, files: files.length });

  const readChanges = hooks.readChanges ?? collectFileChanges;
  const [measurements, changes] = await Promise.all([
    measureFiles(files, {
      directory,
      concurrency: config.concurrency,
      oracle: hooks.oracle,
      onProgress: hooks.onMeasured,
    }),
    readChanges(directory, { since: config.since, extensions, excluded }),
  ]);

  const { rows, metrics } = combineMetrics(measurements, changes, config, excluded);

  return {
    rows,
    metrics,
    stats: {
      filesMeasured: measurements.length,
      filesChanged: changes.length,
      pathsTracked: metrics.length,
      durationMs: Date.now() - startedAt,
    },
  };
}
