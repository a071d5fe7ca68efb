import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { listLevels } from '../commands/levels.js';
import { createCapturedOutput, writeLevel } from './helpers.js';

describe('listLevels', () => {
  let tmpDir: string;
  let levelsDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shell-trainer-levels-'));
    levelsDir = path.join(tmpDir, 'levels');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prints levels in order', () => {
    writeLevel(levelsDir, 'b.json', { number: 2, title: 'Listing', expected_command: 'ls' });
    writeLevel(levelsDir, 'a.json', { number: 10, expected_command: 'pwd' });
    const output = createCapturedOutput();

    const levels = listLevels({ cwd: tmpDir, levelsDir, color: false, output, env: {} });

    expect(levels.map((level) => level.ordinal)).toEqual([2, 10]);
    expect(output.lines()).toEqual(['2. Listing', '10. Level 10', '']);
  });

  it('mentions skipped files', () => {
    writeLevel(levelsDir, 'a.json', { number: 1, title: 'One', expected_command: 'pwd' });
    writeLevel(levelsDir, 'b.json', { number: 1, title: 'Again', expected_command: 'ls' });
    const output = createCapturedOutput();

    listLevels({ cwd: tmpDir, levelsDir, color: false, output, env: {} });

    expect(output.lines()).toEqual([
      '1. One',
      '',
      '1 level file(s) skipped. Run "shell-trainer doctor" for details.',
      '',
    ]);
  });

  it('reports an empty directory', () => {
    fs.mkdirSync(levelsDir);
    const output = createCapturedOutput();

    expect(listLevels({ cwd: tmpDir, levelsDir, color: false, output, env: {} })).toEqual([]);
    expect(output.lines()).toEqual([`No levels found in ${levelsDir}`, '']);
  });
});
