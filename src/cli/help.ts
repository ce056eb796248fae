/**
 * @fileoverview Detailed help text for debt-hotspots CLI commands
 */

import { SORT_CONVENTION } from '../hotspots/sorting.js';

const HELP_TEXT = {
  main: `
debt-hotspots - Find code that changes often and is hard to maintain

USAGE:
    debt-hotspots <command> [options]

COMMANDS:
    report [dir]        Score files, read git history and rank hotspots
    mi [dir]            Print the maintainability score of each source file
    changes [dir]       Print how often each source file changed in git
    combine -m -c       Rank hotspots from precomputed JSON inputs
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --verbose           Log progress details to stderr
    --json              Print errors as a JSON envelope on stderr

HOTSPOT INDEX:
    changes / (maintainability / 100)

    Every directory aggregates the files below it: maintainability is the
    minimum, changes are summed. Higher index means refactor first.

EXIT CODES:
    0  success
    1  unexpected error
    2  invalid argument or configuration
    3  a source file could not be scored
    4  git history unavailable
    5  malformed input file

Run 'debt-hotspots help <command>' for command details.
`,

  report: `
debt-hotspots report - Rank hotspots for a directory

USAGE:
    debt-hotspots report [dir] [options]

OPTIONS:
    -e, --exclude <path>     Exclude a file or directory (repeatable)
    --since <YYYY-MM-DD>     Only count changes after this date
    -s, --sort <field>       Sort field (default: hotspotIndex)
                             path, kind, maintainability, changes, hotspotIndex,
                             linesOfCode, commentsPercentage,
                             cyclomaticComplexity, halsteadVolume
                             Order: ${SORT_CONVENTION}, ties by path
    -f, --format <format>    csv | table | json (default: table)
    --deleted                Keep paths no measured file reached
    --details                Add lines of code, comments, complexity, volume
    --extensions <list>      Source extensions, comma separated
    --concurrency <n>        Files scored in parallel
    --no-progress            Hide the progress bar

    Defaults can also be set in .debt-hotspots.yaml in the analysed directory.

SORTING:
    ${SORT_CONVENTION}; equal values are ordered by path.

EXAMPLES:
    debt-hotspots report
    debt-hotspots report ./src --exclude generated --since 2024-01-01
    debt-hotspots report . --format csv --sort changes > hotspots.csv
`,

  mi: `
debt-hotspots mi - Maintainability score per source file

USAGE:
    debt-hotspots mi [dir] [--json] [--exclude <path>]... [--extensions <list>]

    Scores range from 0 to 100, higher is better. With --json the output is
    an object { "<path>": <score> } suitable for 'combine -m'.
`,

  changes: `
debt-hotspots changes - Change count per source file

USAGE:
    debt-hotspots changes [dir] [--since <YYYY-MM-DD>] [--json]
                          [--exclude <path>]... [--extensions <list>]

    Counts come from 'git log' run in the directory. With --json the output
    is an object { "<path>": <count> } suitable for 'combine -c'.
`,

  combine: `
debt-hotspots combine - Rank hotspots from precomputed inputs

USAGE:
    debt-hotspots combine -m <mi.json> -c <changes.json> [options]

OPTIONS:
    -m, --maintainability <file>   JSON object of scores per file
    -c, --changes <file>           JSON object of change counts per file
    -e, --exclude <path>           Exclude a file or directory (repeatable)
    -s, --sort <field>             Sort field (default: hotspotIndex)
                                   Order: ${SORT_CONVENTION}, ties by path
    -f, --format <format>          csv | table | json (default: table)
    --deleted                      Keep paths without a score

EXAMPLES:
    debt-hotspots mi . --json > mi.json
    debt-hotspots changes . --json > changes.json
    debt-hotspots combine -m mi.json -c changes.json --format csv
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return command in HELP_TEXT;
}

export function getCommandHelp(command?: string): string {
  return command && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}
