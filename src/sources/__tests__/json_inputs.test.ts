import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  loadChangesData,
  loadMaintainabilityData,
  parseChangesData,
  parseMaintainabilityData,
  toChangesRecord,
  toMaintainabilityRecord,
} from '../json_inputs.js';
import { InputFormatError } from '../../core/errors.js';

describe('parseMaintainabilityData', () => {
  it('maps each path to a measurement', () => {
    expect(parseMaintainabilityData({ './a/x.py': 50, 'b.py': 72.5 })).toEqual([
      { path: 'a/x.py', score: 50 },
      { path: 'b.py', score: 72.5 },
    ]);
  });

  it('rejects non-numeric scores', () => {
    expect(() => parseMaintainabilityData({ 'a.py': 'high' }, 'mi.json')).toThrow(InputFormatError);
    expect(() => parseMaintainabilityData([1, 2], 'mi.json')).toThrow(/Invalid input mi\.json/);
  });
});

describe('parseChangesData', () => {
  it('maps each path to a change count', () => {
    expect(parseChangesData({ 'a.py': 3 })).toEqual([{ path: 'a.py', count: 3 }]);
  });

  it('rejects fractional and negative counts', () => {
    expect(() => parseChangesData({ 'a.py': 1.5 })).toThrow(InputFormatError);
    expect(() => parseChangesData({ 'a.py': -1 })).toThrow(/at "a\.py"/);
  });
});

describe('records', () => {
  it('turn measurements and changes back into objects', () => {
    expect(toMaintainabilityRecord([{ path: 'a.py', score: 40 }])).toEqual({ 'a.py': 40 });
    expect(toChangesRecord([{ path: 'a.py', count: 2 }])).toEqual({ 'a.py': 2 });
  });
});

describe('loading files', () => {
  let tmpDir: string;

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('reads both inputs from disk', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'debt-hotspots-json-'));
    const mi = write('mi.json', JSON.stringify({ 'a.py': 61 }));
    const changes = write('changes.json', JSON.stringify({ 'a.py': 4 }));

    expect(await loadMaintainabilityData(mi)).toEqual([{ path: 'a.py', score: 61 }]);
    expect(await loadChangesData(changes)).toEqual([{ path: 'a.py', count: 4 }]);
  });

  it('reports malformed JSON and missing files', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'debt-hotspots-json-'));
    const broken = write('broken.json', '{ "a.py": ');

    await expect(loadMaintainabilityData(broken)).rejects.toThrow(/not valid JSON/);
    await expect(loadChangesData(path.join(tmpDir, 'absent.json'))).rejects.toThrow(InputFormatError);
  });
});
