/**
 * @fileoverview Precomputed inputs as JSON
 *
 * `mi --json` and `changes --json` write flat `{ "<path>": <number> }`
 * objects; `combine` reads them back so scoring and history collection can
 * run separately (or come from other tools).
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { InputFormatError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { normalizePath } from '../utils/paths.js';
import type { FileChange, FileMeasurement } from '../types.js';

const MaintainabilityDataSchema = z.record(z.number().finite());
const ChangesDataSchema = z.record(z.number().int().nonnegative());

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new InputFormatError(filePath, getErrorMessage(error));
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InputFormatError(filePath, `not valid JSON (${getErrorMessage(error)})`);
  }
}

function parseWith<T>(schema: z.ZodType<T>, data: unknown, source: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new InputFormatError(source, `${issue?.message ?? 'unexpected shape'}${where}`);
  }
  return parsed.data;
}

export function parseMaintainabilityData(data: unknown, source = '<maintainability>'): FileMeasurement[] {
  const record = parseWith(MaintainabilityDataSchema, data, source);
  return Object.entries(record).map(([file, score]) => ({ path: normalizePath(file), score }));
}

export function parseChangesData(data: unknown, source = '<changes>'): FileChange[] {
  const record = parseWith(ChangesDataSchema, data, source);
  return Object.entries(record).map(([file, count]) => ({ path: normalizePath(file), count }));
}

export async function loadMaintainabilityData(filePath: string): Promise<FileMeasurement[]> {
  return parseMaintainabilityData(await readJson(filePath), filePath);
}

export async function loadChangesData(filePath: string): Promise<FileChange[]> {
  return parseChangesData(await readJson(filePath), filePath);
}

export function toMaintainabilityRecord(measurements: Iterable<FileMeasurement>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const measurement of measurements) {
    record[measurement.path] = measurement.score;
  }
  return record;
}

export function toChangesRecord(changes: Iterable<FileChange>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const change of changes) {
    record[change.path] = change.count;
  }
  return record;
}
