/**
 * @fileoverview Error hierarchy for hotspot analysis
 *
 * Every failure of a run surfaces as one of these typed errors. Nothing is
 * retried: each input source is read exactly once per run.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class HotspotError extends Error {
  abstract readonly code: string;
  readonly retryable: boolean = false;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends HotspotError {
  readonly code = 'CONFIG_INVALID';

  constructor(
    readonly parameter: string,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { parameter: this.parameter },
    };
  }
}

// ============================================================================
// SOURCE ERRORS
// ============================================================================

/**
 * A source file could not be read or scored. Fatal: a missing measurement
 * would silently skew min-aggregation.
 */
export class MeasurementError extends HotspotError {
  readonly code = 'MEASUREMENT_FAILED';

  constructor(
    readonly filePath: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Failed to measure ${filePath}: ${message}`);
    this.name = 'MeasurementError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
        cause: this.cause?.message,
      },
    };
  }
}

/**
 * The change log could not be read (git missing, not a repository, ...).
 */
export class ChangeLogError extends HotspotError {
  readonly code = 'CHANGE_LOG_FAILED';

  constructor(
    readonly directory: string,
    message: string,
    readonly exitCode?: number,
    readonly stderr?: string,
  ) {
    super(`Change log unavailable for ${directory}: ${message}`);
    this.name = 'ChangeLogError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        directory: this.directory,
        exitCode: this.exitCode,
        stderr: this.stderr,
      },
    };
  }
}

/**
 * A precomputed input (JSON measurements, CSV report) is malformed.
 */
export class InputFormatError extends HotspotError {
  readonly code = 'INPUT_INVALID';

  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`Invalid input ${source}: ${message}`);
    this.name = 'InputFormatError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { source: this.source },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isHotspotError(error: unknown): error is HotspotError {
  return error instanceof HotspotError;
}
