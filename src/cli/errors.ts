/**
 * @fileoverview CLI error handling with recovery hints
 *
 * Every failure leaving the CLI is turned into an {@link ErrorEnvelope}:
 * a machine-readable code, a message, recovery hints and an exit code.
 * With `--json` the envelope is printed as-is on stderr.
 */

import { isHotspotError } from '../core/errors.js';

// ============================================================================
// CODES
// ============================================================================

export const ErrorCodes = {
  EINVALID_ARGUMENT: 'A command-line argument is missing or invalid',
  ECONFIG_INVALID: 'A configuration value is invalid',
  EMEASUREMENT_FAILED: 'A source file could not be read or scored',
  ECHANGE_LOG_FAILED: 'The change history could not be read from git',
  EINPUT_INVALID: 'An input file is missing or malformed',
  EUNKNOWN: 'Unexpected error',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export const ExitCodes: Record<ErrorCode, number> = {
  EINVALID_ARGUMENT: 2,
  ECONFIG_INVALID: 2,
  EMEASUREMENT_FAILED: 3,
  ECHANGE_LOG_FAILED: 4,
  EINPUT_INVALID: 5,
  EUNKNOWN: 1,
};

const RECOVERY_HINTS: Record<ErrorCode, string[]> = {
  EINVALID_ARGUMENT: ['Run `debt-hotspots help <command>` for usage information.'],
  ECONFIG_INVALID: [
    'Check the flag values and `.debt-hotspots.yaml` in the analysed directory.',
    "Dates use the form 'YYYY-MM-DD'.",
  ],
  EMEASUREMENT_FAILED: [
    'Check that the file is readable, or exclude it with `--exclude <path>`.',
  ],
  ECHANGE_LOG_FAILED: [
    'Make sure git is installed and the directory is inside a git repository.',
  ],
  EINPUT_INVALID: [
    'Inputs are JSON objects mapping file paths to numbers, as written by `mi --json` and `changes --json`.',
  ],
  EUNKNOWN: ['Re-run with --verbose for more detail.'],
};

export interface ErrorEnvelope {
  code: string;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, RECOVERY_HINTS[code][0], details);
}

// ============================================================================
// ENVELOPES
// ============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Pick<ErrorEnvelope, 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  return {
    code,
    message,
    retryable: false,
    recoveryHints: overrides.recoveryHints ?? [...RECOVERY_HINTS[code]],
    context: { timestamp: new Date().toISOString(), ...overrides.context },
  };
}

function hotspotErrorCode(code: string): ErrorCode {
  switch (code) {
    case 'CONFIG_INVALID':
      return 'ECONFIG_INVALID';
    case 'MEASUREMENT_FAILED':
      return 'EMEASUREMENT_FAILED';
    case 'CHANGE_LOG_FAILED':
      return 'ECHANGE_LOG_FAILED';
    case 'INPUT_INVALID':
      return 'EINPUT_INVALID';
    default:
      return 'EUNKNOWN';
  }
}

/**
 * Map any thrown value to an envelope.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, {
      recoveryHints: error.suggestion ? [error.suggestion] : undefined,
      context: error.details,
    });
  }
  if (isHotspotError(error)) {
    const json = error.toJSON();
    return createErrorEnvelope(hotspotErrorCode(json.code), json.message, {
      context: { errorName: error.name, ...json.details },
    });
  }
  if (error instanceof Error) {
    return createErrorEnvelope('EUNKNOWN', error.message);
  }
  return createErrorEnvelope('EUNKNOWN', String(error));
}

function isErrorCode(code: string): code is ErrorCode {
  return code in ErrorCodes;
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return isErrorCode(envelope.code) ? ExitCodes[envelope.code] : 1;
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
