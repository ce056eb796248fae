/**
 * Shared Vitest setup for debt-hotspots
 *
 * Logs are silenced unless DEBT_HOTSPOTS_LOG_LEVEL is set for the run, so a
 * `--verbose` shell does not flood the test output.
 */

import { beforeEach } from 'vitest';

const RUN_LOG_LEVEL = process.env.DEBT_HOTSPOTS_LOG_LEVEL;

beforeEach(() => {
  delete process.env.DEBT_HOTSPOTS_VERBOSE;
  process.env.DEBT_HOTSPOTS_LOG_LEVEL = RUN_LOG_LEVEL ?? 'silent';
});
