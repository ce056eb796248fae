/**
 * @fileoverview Parallel maintainability scoring
 *
 * Files are read and scored with bounded concurrency. Workers only return
 * {@link FileMeasurement} values; folding them into the metrics map is left
 * to a single sequential pass in the aggregator.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { mapWithConcurrency } from '../utils/async.js';
import { MeasurementError, isHotspotError } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { createMaintainabilityOracle, type MaintainabilityOracle } from './maintainability_index.js';
import type { FileMeasurement } from '../types.js';

export interface MeasureFilesOptions {
  /** Directory the relative file paths resolve against */
  directory: string;
  concurrency: number;
  oracle?: MaintainabilityOracle;
  /** Called after each file, with the number of files done so far */
  onProgress?: (completed: number, total: number, filePath: string) => void;
}

/**
 * Score every file. Any unreadable or unparseable file aborts the whole
 * call with a {@link MeasurementError}.
 */
export async function measureFiles(
  files: readonly string[],
  options: MeasureFilesOptions
): Promise<FileMeasurement[]> {
  const oracle = options.oracle ?? createMaintainabilityOracle();
  let completed = 0;

  return mapWithConcurrency(files, options.concurrency, async (file) => {
    const measurement = await measureFile(file, options.directory, oracle);
    completed++;
    options.onProgress?.(completed, files.length, file);
    return measurement;
  });
}

export async function measureFile(
  file: string,
  directory: string,
  oracle: MaintainabilityOracle
): Promise<FileMeasurement> {
  let source: string;
  try {
    source = await fs.readFile(path.join(directory, file), 'utf8');
  } catch (error) {
    throw new MeasurementError(file, getErrorMessage(error), toError(error));
  }

  try {
    const result = await oracle.measure(source, file);
    return { path: file, score: result.score, details: result.details };
  } catch (error) {
    if (isHotspotError(error)) throw error;
    throw new MeasurementError(file, getErrorMessage(error), toError(error));
  }
}
