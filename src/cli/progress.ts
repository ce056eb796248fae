/**
 * @fileoverview Progress reporting for long-running scoring
 *
 * The bar writes to stderr so report output on stdout stays clean.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  stream?: NodeJS.WritableStream;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const bar = new cliProgress.SingleBar(
    {
      format: '{bar} {percentage}% | {value}/{total} files | ETA: {eta_formatted}',
      stream: options.stream ?? process.stderr,
      hideCursor: true,
      clearOnComplete: true,
      stopOnComplete: true,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0);

  return {
    update: (current) => bar.update(current),
    stop: () => bar.stop(),
  };
}

/**
 * A bar only makes sense on an interactive stderr.
 */
export function shouldShowProgress(enabled: boolean, stream: { isTTY?: boolean } = process.stderr): boolean {
  return enabled && stream.isTTY === true;
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
