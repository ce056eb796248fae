#!/usr/bin/env node
/**
 * @fileoverview debt-hotspots CLI
 *
 * Commands:
 *   debt-hotspots report [dir]     - Rank hotspots (maintainability x churn)
 *   debt-hotspots mi [dir]         - Maintainability score per file
 *   debt-hotspots changes [dir]    - Change count per file from git
 *   debt-hotspots combine -m -c    - Rank hotspots from precomputed JSON
 *   debt-hotspots help [command]   - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { showHelp } from './help.js';
import { reportCommand } from './commands/report.js';
import { miCommand } from './commands/mi.js';
import { changesCommand } from './commands/changes.js';
import { combineCommand } from './commands/combine.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { DEBT_HOTSPOTS_VERSION } from '../version.js';

type Command = 'report' | 'mi' | 'changes' | 'combine' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  'report': {
    description: 'Score files, read git history and rank hotspots',
    usage: 'debt-hotspots report [dir] [--exclude <path>] [--since YYYY-MM-DD] [--sort <field>] [--format csv|table|json]',
  },
  'mi': {
    description: 'Print the maintainability score of each source file',
    usage: 'debt-hotspots mi [dir] [--json]',
  },
  'changes': {
    description: 'Print how often each source file changed in git',
    usage: 'debt-hotspots changes [dir] [--since YYYY-MM-DD] [--json]',
  },
  'combine': {
    description: 'Rank hotspots from precomputed JSON inputs',
    usage: 'debt-hotspots combine -m <mi.json> -c <changes.json>',
  },
  'help': {
    description: 'Show help information',
    usage: 'debt-hotspots help [command]',
  },
};

function isCommand(value: string): value is Command {
  return value in COMMANDS;
}

/**
 * Check if --json flag is present in arguments
 */
function hasJsonFlag(args: string[]): boolean {
  return args.includes('--json');
}

function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  // Global options only; each command parses its own flags strictly
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      verbose: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    console.log(`debt-hotspots ${DEBT_HOTSPOTS_VERSION.string}`);
    return;
  }

  const command = positionals[0];
  const jsonMode = hasJsonFlag(args);

  if (values.help === true || command === undefined || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'debt-hotspots help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  if (values.verbose === true) {
    process.env.DEBT_HOTSPOTS_VERBOSE = '1';
  }

  const commandArgs = [...args];
  commandArgs.splice(commandArgs.indexOf(command), 1);

  try {
    switch (command) {
      case 'report':
        await reportCommand({ args: commandArgs });
        break;
      case 'mi':
        await miCommand({ args: commandArgs });
        break;
      case 'changes':
        await changesCommand({ args: commandArgs });
        break;
      case 'combine':
        await combineCommand({ args: commandArgs });
        break;
    }
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

main().catch((error: unknown) => {
  const envelope = classifyError(error);
  outputStructuredError(envelope, hasJsonFlag(process.argv));
  process.exitCode = getExitCode(envelope);
});
