/**
 * @fileoverview Report command
 *
 * Scores every source file, reads the git history and prints the combined
 * hotspot table.
 *
 * Usage:
 *   debt-hotspots report [dir] [--exclude <path>]... [--since YYYY-MM-DD]
 *                        [--sort <field>] [--format csv|table|json]
 *                        [--deleted] [--details] [--extensions .ts,.js]
 *                        [--concurrency N] [--no-progress]
 */

import { parseArgs } from 'node:util';
import {
  loadHotspotConfig,
  parseOutputFormat,
  parseSince,
  parseSortField,
  type HotspotConfigOverrides,
} from '../../config/index.js';
import { runHotspotAnalysis, type AnalysisHooks } from '../../hotspots/analysis.js';
import { renderMetrics } from '../../render/index.js';
import { logInfo } from '../../telemetry/logger.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerArg,
  parseListArg,
  resolveDirectoryArg,
} from '../args.js';
import { createProgressBar, formatDuration, shouldShowProgress, type ProgressBarHandle } from '../progress.js';

export interface ReportCommandOptions {
  args: string[];
  write?: (chunk: string) => void;
  /** Test seam for the oracles */
  hooks?: Pick<AnalysisHooks, 'oracle' | 'readChanges'>;
}

export async function reportCommand(options: ReportCommandOptions): Promise<void> {
  const write = options.write ?? ((chunk: string) => process.stdout.write(chunk));

  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        ...GLOBAL_OPTIONS,
        exclude: { type: 'string', short: 'e', multiple: true },
        since: { type: 'string' },
        sort: { type: 'string', short: 's' },
        format: { type: 'string', short: 'f' },
        deleted: { type: 'boolean' },
        details: { type: 'boolean' },
        extensions: { type: 'string' },
        concurrency: { type: 'string' },
        'no-progress': { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  const overrides: HotspotConfigOverrides = {
    excludePaths: values.exclude,
    since: parseSince(values.since),
    sortField: values.sort === undefined ? undefined : parseSortField(values.sort),
    format: values.format === undefined ? undefined : parseOutputFormat(values.format),
    includeDeleted: values.deleted,
    details: values.details,
    extensions: parseListArg(values.extensions),
    concurrency: parseIntegerArg(values.concurrency, '--concurrency'),
    progress: values['no-progress'] ? false : undefined,
  };

  const directory = await resolveDirectoryArg(positionals, 'report');
  const config = await loadHotspotConfig(directory, overrides);

  const progress: { bar: ProgressBarHandle | null } = { bar: null };
  const hooks: AnalysisHooks = { ...options.hooks };
  if (shouldShowProgress(config.progress)) {
    hooks.onDiscovered = (total) => {
      if (total > 0) progress.bar = createProgressBar({ total });
    };
    hooks.onMeasured = (completed) => progress.bar?.update(completed);
  }

  try {
    const report = await runHotspotAnalysis(directory, config, hooks);
    write(renderMetrics(report.rows, config.format, { details: config.details }));
    logInfo('[debt-hotspots] Report complete', {
      ...report.stats,
      rows: report.rows.length,
      duration: formatDuration(report.stats.durationMs),
    });
  } finally {
    progress.bar?.stop();
  }
}
