/**
 * @fileoverview Combine command
 *
 * Aggregates precomputed inputs (`mi --json`, `changes --json`, or any tool
 * writing the same `{ "<path>": <number> }` shape) without touching the
 * analysed tree.
 *
 * Usage:
 *   debt-hotspots combine -m <mi.json> -c <changes.json> [--sort <field>]
 *                         [--format csv|table|json] [--deleted]
 *                         [--exclude <path>]...
 */

import { parseArgs } from 'node:util';
import { parseOutputFormat, parseSortField, resolveConfig } from '../../config/index.js';
import { combineMetrics } from '../../hotspots/analysis.js';
import { renderMetrics } from '../../render/index.js';
import { loadChangesData, loadMaintainabilityData } from '../../sources/json_inputs.js';
import { GLOBAL_OPTIONS, parseCommandArgs, parseListArg, requireStringArg } from '../args.js';
import { createError } from '../errors.js';

export interface CombineCommandOptions {
  args: string[];
  write?: (chunk: string) => void;
}

export async function combineCommand(options: CombineCommandOptions): Promise<void> {
  const write = options.write ?? ((chunk: string) => process.stdout.write(chunk));

  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        ...GLOBAL_OPTIONS,
        maintainability: { type: 'string', short: 'm' },
        changes: { type: 'string', short: 'c' },
        exclude: { type: 'string', short: 'e', multiple: true },
        sort: { type: 'string', short: 's' },
        format: { type: 'string', short: 'f' },
        deleted: { type: 'boolean' },
        extensions: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  if (positionals.length > 0) {
    throw createError('EINVALID_ARGUMENT', `combine takes no positional arguments, got "${positionals.join(' ')}"`);
  }

  const miFile = requireStringArg(values.maintainability, '-m', 'combine');
  const changesFile = requireStringArg(values.changes, '-c', 'combine');

  const config = resolveConfig({
    excludePaths: values.exclude,
    sortField: values.sort === undefined ? undefined : parseSortField(values.sort),
    format: values.format === undefined ? undefined : parseOutputFormat(values.format),
    includeDeleted: values.deleted,
    extensions: parseListArg(values.extensions),
  });

  const [measurements, changes] = await Promise.all([
    loadMaintainabilityData(miFile),
    loadChangesData(changesFile),
  ]);

  const { rows } = combineMetrics(measurements, changes, config);
  write(renderMetrics(rows, config.format));
}
