import { describe, it, expect } from 'vitest';
import { getCommandHelp } from '../help.js';

describe('getCommandHelp', () => {
  it('documents the sort order next to --sort', () => {
    const lines = getCommandHelp('report').split('\n');
    const sortLine = lines.findIndex((line) => line.includes('-s, --sort <field>'));

    expect(lines[sortLine + 4]).toBe(
      '                             Order: path/kind ascending, numeric fields descending, ties by path'
    );
  });

  it('documents the sort order for combine', () => {
    expect(getCommandHelp('combine')).toContain(
      'Order: path/kind ascending, numeric fields descending, ties by path'
    );
  });

  it('falls back to the main help for unknown topics', () => {
    expect(getCommandHelp('nope')).toBe(getCommandHelp());
  });
});
