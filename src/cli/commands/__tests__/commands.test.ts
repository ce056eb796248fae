import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { reportCommand } from '../report.js';
import { miCommand } from '../mi.js';
import { changesCommand } from '../changes.js';
import { combineCommand } from '../combine.js';
import { CliError } from '../../errors.js';
import { ConfigurationError, InputFormatError } from '../../../core/errors.js';
import type { MaintainabilityOracle } from '../../../sources/maintainability_index.js';
import type { ChangeLogOptions } from '../../../sources/git_change_log.js';
import type { FileChange } from '../../../types.js';

const details = { linesOfCode: 1, commentsPercentage: 0, cyclomaticComplexity: 1, halsteadVolume: 1 };
const lengthOracle: MaintainabilityOracle = {
  measure: (source) => ({ score: 100 - source.length, details }),
};

let tmpDir: string | null = null;

afterEach(() => {
  if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = null;
});

function createDir(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'debt-hotspots-cli-'));
  for (const [file, content] of Object.entries(files)) {
    const full = path.join(dir, file);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
  tmpDir = dir;
  return dir;
}

function collector(): { write: (chunk: string) => void; text: () => string } {
  const chunks: string[] = [];
  return { write: (chunk) => chunks.push(chunk), text: () => chunks.join('') };
}

describe('reportCommand', () => {
  it('prints the combined rows in the requested format', async () => {
    const dir = createDir({ 'a.ts': 'x'.repeat(20), 'skip/b.ts': 'b' });
    const out = collector();
    const seen: ChangeLogOptions[] = [];

    await reportCommand({
      args: [dir, '--format', 'csv', '--exclude', 'skip', '--since', '2024-01-01', '--no-progress'],
      write: out.write,
      hooks: {
        oracle: lengthOracle,
        readChanges: async (_dir, options): Promise<FileChange[]> => {
          seen.push(options);
          return [{ path: 'a.ts', count: 2 }];
        },
      },
    });

    expect(out.text()).toBe(
      'path,kind,maintainability,changes,hotspotIndex\n.,package,80,2,2.5\na.ts,module,80,2,2.5\n'
    );
    expect(seen[0]?.since).toBe('2024-01-01');
  });

  it('reads defaults from the config file', async () => {
    const dir = createDir({ 'a.ts': 'x'.repeat(20), '.debt-hotspots.yaml': 'format: json\nsortField: path\n' });
    const out = collector();

    await reportCommand({
      args: [dir, '--no-progress'],
      write: out.write,
      hooks: { oracle: lengthOracle, readChanges: async () => [] },
    });

    expect(JSON.parse(out.text())).toEqual([
      { path: '.', kind: 'package', maintainability: 80, changes: 0, hotspotIndex: 0 },
      { path: 'a.ts', kind: 'module', maintainability: 80, changes: 0, hotspotIndex: 0 },
    ]);
  });

  it('rejects a malformed date before reading anything', async () => {
    const readChanges = async (): Promise<FileChange[]> => {
      throw new Error('should not run');
    };
    await expect(
      reportCommand({ args: ['/definitely/missing', '--since', '2024-13-01'], hooks: { readChanges } })
    ).rejects.toThrow(ConfigurationError);
  });

  it('rejects unknown sort fields and flags', async () => {
    await expect(reportCommand({ args: ['--sort', 'churn'] })).rejects.toThrow(/Unknown sort field "churn"/);
    await expect(reportCommand({ args: ['--colour'] })).rejects.toThrow(CliError);
  });
});

describe('miCommand', () => {
  it('prints one score per file', async () => {
    const dir = createDir({ 'a.ts': 'x'.repeat(20), 'b/c.ts': 'x'.repeat(5) });
    const out = collector();

    await miCommand({ args: [dir], write: out.write, oracle: lengthOracle });

    expect(out.text()).toBe('a.ts --> 80.00\nb/c.ts --> 95.00\n');
  });

  it('prints JSON that combine reads', async () => {
    const dir = createDir({ 'a.ts': 'x'.repeat(20) });
    const out = collector();

    await miCommand({ args: [dir, '--json'], write: out.write, oracle: lengthOracle });

    expect(JSON.parse(out.text())).toEqual({ 'a.ts': 80 });
  });
});

describe('changesCommand', () => {
  it('prints one count per file', async () => {
    const dir = createDir({});
    const out = collector();
    const seen: ChangeLogOptions[] = [];

    await changesCommand({
      args: [dir, '--since', '2023-06-01'],
      write: out.write,
      readChanges: async (_dir, options) => {
        seen.push(options);
        return [
          { path: 'a.ts', count: 3 },
          { path: 'b.ts', count: 1 },
        ];
      },
    });

    expect(out.text()).toBe('a.ts --> 3\nb.ts --> 1\n');
    expect(seen[0]?.since).toBe('2023-06-01');
  });

  it('prints JSON with --json', async () => {
    const dir = createDir({});
    const out = collector();

    await changesCommand({
      args: [dir, '--json'],
      write: out.write,
      readChanges: async () => [{ path: 'a.ts', count: 3 }],
    });

    expect(JSON.parse(out.text())).toEqual({ 'a.ts': 3 });
  });
});

describe('combineCommand', () => {
  function writeInputs(mi: unknown, changes: unknown): { mi: string; changes: string } {
    const dir = createDir({
      'mi.json': JSON.stringify(mi),
      'changes.json': JSON.stringify(changes),
    });
    return { mi: path.join(dir, 'mi.json'), changes: path.join(dir, 'changes.json') };
  }

  it('aggregates precomputed inputs', async () => {
    const files = writeInputs({ 'a/x.py': 50, 'a/y.py': 30 }, { 'a/x.py': 2, 'a/y.py': 1 });
    const out = collector();

    await combineCommand({
      args: ['-m', files.mi, '-c', files.changes, '--format', 'json', '--extensions', '.py'],
      write: out.write,
    });

    const rows: Array<{ path: string; kind: string; maintainability: number; changes: number }> = JSON.parse(
      out.text()
    );
    expect(rows.map((r) => r.path)).toEqual(['.', 'a', 'a/x.py', 'a/y.py']);
    expect(rows[1]).toMatchObject({ kind: 'package', maintainability: 30, changes: 3 });
  });

  it('requires both inputs', async () => {
    await expect(combineCommand({ args: ['-m', 'mi.json'] })).rejects.toThrow('combine requires -c <file>');
  });

  it('rejects stray positionals', async () => {
    await expect(combineCommand({ args: ['mi.json'] })).rejects.toThrow(CliError);
  });

  it('reports malformed inputs', async () => {
    const files = writeInputs({ 'a.py': 'bad' }, {});
    await expect(combineCommand({ args: ['-m', files.mi, '-c', files.changes] })).rejects.toThrow(
      InputFormatError
    );
  });
});
