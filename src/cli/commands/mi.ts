/**
 * @fileoverview Maintainability command
 *
 * Prints the maintainability score of every source file, one
 * `path --> score` line each, or a JSON object that `combine -m` reads.
 *
 * Usage:
 *   debt-hotspots mi [dir] [--json] [--exclude <path>]... [--extensions .ts,.js]
 */

import { parseArgs } from 'node:util';
import { loadHotspotConfig } from '../../config/index.js';
import { createExclusionSet } from '../../hotspots/exclusion.js';
import { toExtensionSet } from '../../hotspots/path_classifier.js';
import { discoverSourceFiles } from '../../sources/file_discovery.js';
import { measureFiles } from '../../sources/measure_files.js';
import { toMaintainabilityRecord } from '../../sources/json_inputs.js';
import type { MaintainabilityOracle } from '../../sources/maintainability_index.js';
import { GLOBAL_OPTIONS, parseCommandArgs, parseIntegerArg, parseListArg, resolveDirectoryArg } from '../args.js';

export interface MiCommandOptions {
  args: string[];
  write?: (chunk: string) => void;
  oracle?: MaintainabilityOracle;
}

export async function miCommand(options: MiCommandOptions): Promise<void> {
  const write = options.write ?? ((chunk: string) => process.stdout.write(chunk));

  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        ...GLOBAL_OPTIONS,
        exclude: { type: 'string', short: 'e', multiple: true },
        extensions: { type: 'string' },
        concurrency: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  const directory = await resolveDirectoryArg(positionals, 'mi');
  const config = await loadHotspotConfig(directory, {
    excludePaths: values.exclude,
    extensions: parseListArg(values.extensions),
    concurrency: parseIntegerArg(values.concurrency, '--concurrency'),
  });

  const files = await discoverSourceFiles(directory, {
    extensions: toExtensionSet(config.extensions),
    excluded: createExclusionSet(config.excludePaths, directory),
  });
  const measurements = await measureFiles(files, {
    directory,
    concurrency: config.concurrency,
    oracle: options.oracle,
  });

  if (values.json) {
    write(JSON.stringify(toMaintainabilityRecord(measurements), null, 2) + '\n');
    return;
  }
  for (const measurement of measurements) {
    write(`${measurement.path} --> ${measurement.score.toFixed(2)}\n`);
  }
}
