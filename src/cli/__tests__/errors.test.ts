/**
 * @fileoverview Tests for CLI error envelopes and exit codes
 */

import { describe, it, expect } from 'vitest';
import {
  CliError,
  ErrorCodes,
  ExitCodes,
  classifyError,
  createError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorCode,
  type ErrorEnvelope,
} from '../errors.js';
import {
  ChangeLogError,
  ConfigurationError,
  InputFormatError,
  MeasurementError,
} from '../../core/errors.js';

describe('createErrorEnvelope', () => {
  it('fills hints and a timestamp', () => {
    const envelope = createErrorEnvelope('ECHANGE_LOG_FAILED', 'no git');

    expect(envelope.code).toBe('ECHANGE_LOG_FAILED');
    expect(envelope.retryable).toBe(false);
    expect(envelope.recoveryHints.length).toBeGreaterThan(0);
    expect(typeof envelope.context?.timestamp).toBe('string');
  });

  it('takes overrides', () => {
    const envelope = createErrorEnvelope('EUNKNOWN', 'x', { recoveryHints: ['custom'], context: { a: 1 } });
    expect(envelope.recoveryHints).toEqual(['custom']);
    expect(envelope.context?.a).toBe(1);
  });
});

describe('ErrorCodes', () => {
  it('has a description and an exit code for every code', () => {
    const codes = Object.keys(ErrorCodes) as ErrorCode[];
    for (const code of codes) {
      expect(ErrorCodes[code].length).toBeGreaterThan(0);
      expect(ExitCodes[code]).toBeGreaterThan(0);
    }
  });
});

describe('classifyError', () => {
  it.each([
    [new ConfigurationError('since', "Invalid date format. Use 'YYYY-MM-DD'"), 'ECONFIG_INVALID', 2],
    [new MeasurementError('a.ts', 'EACCES'), 'EMEASUREMENT_FAILED', 3],
    [new ChangeLogError('/repo', 'not a git repository', 128), 'ECHANGE_LOG_FAILED', 4],
    [new InputFormatError('mi.json', 'not valid JSON'), 'EINPUT_INVALID', 5],
    [new Error('boom'), 'EUNKNOWN', 1],
  ] as const)('maps %s', (error, code, exitCode) => {
    const envelope = classifyError(error);
    expect(envelope.code).toBe(code);
    expect(getExitCode(envelope)).toBe(exitCode);
  });

  it('keeps typed error details in the context', () => {
    const envelope = classifyError(new MeasurementError('src/a.ts', 'EACCES'));
    expect(envelope.context).toMatchObject({ errorName: 'MeasurementError', filePath: 'src/a.ts' });
    expect(envelope.message).toBe('Failed to measure src/a.ts: EACCES');
  });

  it('uses the suggestion of a CliError as its hint', () => {
    const envelope = classifyError(createError('EINVALID_ARGUMENT', 'Not a directory: /x'));
    expect(envelope.recoveryHints).toEqual(['Run `debt-hotspots help <command>` for usage information.']);
    expect(getExitCode(envelope)).toBe(2);
  });

  it('handles non-error values', () => {
    expect(classifyError('plain').message).toBe('plain');
  });
});

describe('getExitCode', () => {
  it('returns 1 for unknown codes', () => {
    const envelope: ErrorEnvelope = { code: 'CUSTOM', message: 'x', retryable: false, recoveryHints: [] };
    expect(getExitCode(envelope)).toBe(1);
  });
});

describe('formatting', () => {
  it('lists recovery suggestions', () => {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', 'bad flag', { recoveryHints: ['try again'] });
    expect(formatErrorWithHints(envelope)).toBe(
      'Error [EINVALID_ARGUMENT]: bad flag\n\nRecovery suggestions:\n  - try again'
    );
  });

  it('wraps the envelope for JSON output', () => {
    const envelope = createErrorEnvelope('EINPUT_INVALID', 'bad', { recoveryHints: [] });
    expect(JSON.parse(formatErrorJson(envelope))).toEqual({ error: envelope });
  });
});
