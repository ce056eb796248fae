import { describe, it, expect, beforeEach, vi } from 'vitest';
import { execa } from 'execa';
import {
  buildGitLogArgs,
  collectFileChanges,
  countChanges,
  readChangeLog,
} from '../git_change_log.js';
import { toExtensionSet } from '../../hotspots/path_classifier.js';
import { createExclusionSet } from '../../hotspots/exclusion.js';
import { ChangeLogError } from '../../core/errors.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

function buildExecaResult(options: { exitCode: number; stdout?: string; stderr?: string; failed?: boolean }) {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    failed: options.failed ?? options.exitCode !== 0,
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

const py = toExtensionSet(['.py']);

beforeEach(() => {
  execaMock.mockReset();
});

describe('buildGitLogArgs', () => {
  it('lists changed file names relative to the directory', () => {
    expect(buildGitLogArgs()).toEqual(['log', '--name-only', '--relative', '-z', '--pretty=format:', '--', '.']);
  });

  it('adds --since when given', () => {
    expect(buildGitLogArgs('2024-01-01')).toEqual([
      'log',
      '--name-only',
      '--relative',
      '-z',
      '--pretty=format:',
      '--since',
      '2024-01-01',
      '--',
      '.',
    ]);
  });
});

describe('readChangeLog', () => {
  it('runs git in the directory and returns one line per file per commit', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 0, stdout: 'a.py\0b.py\0\0a.py\0./c/d.py\0' }));

    const lines = await readChangeLog('/repo', '2024-01-01');

    expect(lines).toEqual(['a.py', 'b.py', 'a.py', 'c/d.py']);
    expect(execaMock).toHaveBeenCalledWith('git', buildGitLogArgs('2024-01-01'), {
      cwd: '/repo',
      reject: false,
    });
  });

  it('keeps non-ASCII, quoted and space-padded names verbatim', async () => {
    execaMock.mockResolvedValue(
      buildExecaResult({ exitCode: 0, stdout: 'café.ts\0plain.ts\0\0say "hi".ts\0 lead.ts\0' })
    );

    const lines = await readChangeLog('/repo');

    expect(lines).toEqual(['café.ts', 'plain.ts', 'say "hi".ts', ' lead.ts']);
    expect(execaMock.mock.calls[0]?.[1]).toContain('-z');
    expect(countChanges(lines, { extensions: toExtensionSet(['.ts']) })).toEqual([
      { path: 'café.ts', count: 1 },
      { path: 'plain.ts', count: 1 },
      { path: 'say "hi".ts', count: 1 },
      { path: ' lead.ts', count: 1 },
    ]);
  });

  it('fails on a non-zero exit with the git message', async () => {
    execaMock.mockResolvedValue(
      buildExecaResult({ exitCode: 128, stderr: 'fatal: not a git repository\n' })
    );

    const error = await readChangeLog('/tmp/plain').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChangeLogError);
    expect(error).toMatchObject({
      directory: '/tmp/plain',
      exitCode: 128,
      stderr: 'fatal: not a git repository',
      message: 'Change log unavailable for /tmp/plain: fatal: not a git repository',
    });
  });

  it('wraps a git that cannot be spawned', async () => {
    execaMock.mockRejectedValue(new Error('spawn git ENOENT'));

    await expect(readChangeLog('/repo')).rejects.toThrow(ChangeLogError);
  });
});

describe('countChanges', () => {
  it('counts occurrences in first-seen order', () => {
    expect(countChanges(['b.py', 'a.py', 'b.py', 'b.py'], { extensions: py })).toEqual([
      { path: 'b.py', count: 3 },
      { path: 'a.py', count: 1 },
    ]);
  });

  it('drops non-source and excluded paths', () => {
    const excluded = createExclusionSet(['gen']);
    expect(
      countChanges(['README.md', 'gen/out.py', 'src/main.py', 'general/x.py'], { extensions: py, excluded })
    ).toEqual([
      { path: 'src/main.py', count: 1 },
      { path: 'general/x.py', count: 1 },
    ]);
  });
});

describe('collectFileChanges', () => {
  it('reads and counts in one call', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 0, stdout: 'x.py\0x.py\0y.txt\0' }));

    await expect(collectFileChanges('/repo', { extensions: py })).resolves.toEqual([{ path: 'x.py', count: 2 }]);
  });
});
