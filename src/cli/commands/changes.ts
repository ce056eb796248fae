/**
 * @fileoverview Changes command
 *
 * Prints how often each source file changed in git, one `path --> count`
 * line each, or a JSON object that `combine -c` reads.
 *
 * Usage:
 *   debt-hotspots changes [dir] [--since YYYY-MM-DD] [--json]
 *                         [--exclude <path>]... [--extensions .ts,.js]
 */

import { parseArgs } from 'node:util';
import { loadHotspotConfig, parseSince } from '../../config/index.js';
import { createExclusionSet } from '../../hotspots/exclusion.js';
import { toExtensionSet } from '../../hotspots/path_classifier.js';
import { collectFileChanges, type ChangeLogOptions } from '../../sources/git_change_log.js';
import { toChangesRecord } from '../../sources/json_inputs.js';
import type { FileChange } from '../../types.js';
import { GLOBAL_OPTIONS, parseCommandArgs, parseListArg, resolveDirectoryArg } from '../args.js';

export interface ChangesCommandOptions {
  args: string[];
  write?: (chunk: string) => void;
  readChanges?: (directory: string, options: ChangeLogOptions) => Promise<FileChange[]>;
}

export async function changesCommand(options: ChangesCommandOptions): Promise<void> {
  const write = options.write ?? ((chunk: string) => process.stdout.write(chunk));

  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        ...GLOBAL_OPTIONS,
        exclude: { type: 'string', short: 'e', multiple: true },
        since: { type: 'string' },
        extensions: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  const since = parseSince(values.since);
  const directory = await resolveDirectoryArg(positionals, 'changes');
  const config = await loadHotspotConfig(directory, {
    excludePaths: values.exclude,
    since,
    extensions: parseListArg(values.extensions),
  });

  const readChanges = options.readChanges ?? collectFileChanges;
  const changes = await readChanges(directory, {
    since: config.since,
    extensions: toExtensionSet(config.extensions),
    excluded: createExclusionSet(config.excludePaths, directory),
  });

  if (values.json) {
    write(JSON.stringify(toChangesRecord(changes), null, 2) + '\n');
    return;
  }
  for (const change of changes) {
    write(`${change.path} --> ${change.count}\n`);
  }
}
