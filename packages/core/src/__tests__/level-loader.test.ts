import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TrainerError } from '../errors/index.js';
import { loadLevels, loadLevelsFromRecords } from '../levels/loader.js';
import type { LogEntry } from '../observability/index.js';
import { createLogger } from '../observability/index.js';

function writeLevel(dir: string, name: string, data: unknown): void {
  fs.writeFileSync(path.join(dir, name), JSON.stringify(data), 'utf-8');
}

describe('loadLevels', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shell-trainer-levels-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads levels ordered by number, not file name', () => {
    writeLevel(tmpDir, 'a.json', {
      number: 2,
      title: 'List files',
      description: 'Show the files here.',
      expected_command: 'ls',
      hint: 'Two letters.',
    });
    writeLevel(tmpDir, 'b.json', {
      number: 1,
      title: 'Where am I?',
      description: 'Print the working directory.',
      expected_command: 'pwd',
      hint: 'print working directory',
    });

    const { levels, issues } = loadLevels(tmpDir);

    expect(issues).toEqual([]);
    expect(levels.map((level) => level.ordinal)).toEqual([1, 2]);
    expect(levels[0]).toEqual({
      ordinal: 1,
      title: 'Where am I?',
      description: 'Print the working directory.',
      expectedCommand: 'pwd',
      hint: 'print working directory',
    });
  });

  it('fills defaults for optional fields', () => {
    writeLevel(tmpDir, 'level.json', { number: 7, expected_command: 'whoami' });

    const { levels } = loadLevels(tmpDir);

    expect(levels[0]).toEqual({
      ordinal: 7,
      title: 'Level 7',
      description: '',
      expectedCommand: 'whoami',
      hint: '',
    });
  });

  it('ignores files that are not JSON', () => {
    writeLevel(tmpDir, 'one.json', { number: 1, expected_command: 'pwd' });
    fs.writeFileSync(path.join(tmpDir, 'README.md'), '# notes', 'utf-8');

    const { levels, issues } = loadLevels(tmpDir);

    expect(levels).toHaveLength(1);
    expect(issues).toEqual([]);
  });

  it('accepts upper-case .JSON extensions', () => {
    writeLevel(tmpDir, 'ONE.JSON', { number: 1, expected_command: 'pwd' });

    expect(loadLevels(tmpDir).levels).toHaveLength(1);
  });

  it('skips malformed JSON and keeps loading', () => {
    fs.writeFileSync(path.join(tmpDir, 'broken.json'), '{ "number": 1,', 'utf-8');
    writeLevel(tmpDir, 'good.json', { number: 2, expected_command: 'ls' });

    const { levels, issues } = loadLevels(tmpDir);

    expect(levels.map((level) => level.ordinal)).toEqual([2]);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.file).toBe('broken.json');
    expect(issues[0]?.error.code).toBe('TRAINER_L101');
  });

  it('skips records that fail the schema', () => {
    writeLevel(tmpDir, 'no-answer.json', { number: 1, title: 'Missing answer' });
    writeLevel(tmpDir, 'bad-number.json', { number: 'two', expected_command: 'ls' });

    const { levels, issues } = loadLevels(tmpDir);

    expect(levels).toEqual([]);
    expect(issues.map((issue) => issue.file)).toEqual(['bad-number.json', 'no-answer.json']);
    expect(issues.every((issue) => issue.error.code === 'TRAINER_L101')).toBe(true);
    expect(issues[1]?.error.message).toContain('expected_command');
  });

  it('keeps the first file for a duplicated number', () => {
    writeLevel(tmpDir, '01-pwd.json', { number: 1, expected_command: 'pwd' });
    writeLevel(tmpDir, '02-ls.json', { number: 1, expected_command: 'ls' });

    const { levels, issues } = loadLevels(tmpDir);

    expect(levels).toHaveLength(1);
    expect(levels[0]?.expectedCommand).toBe('pwd');
    expect(issues[0]?.file).toBe('02-ls.json');
    expect(issues[0]?.error.code).toBe('TRAINER_L102');
  });

  it('reports skipped files through the logger', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ handler: (entry) => entries.push(entry) });
    fs.writeFileSync(path.join(tmpDir, 'broken.json'), 'not json', 'utf-8');

    loadLevels(tmpDir, { logger });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('warn');
    expect(entries[0]?.data).toEqual({ code: 'TRAINER_L101' });
  });

  it('returns no levels for an empty directory', () => {
    expect(loadLevels(tmpDir)).toEqual({ levels: [], issues: [] });
  });

  it('throws TRAINER_L100 for a missing directory', () => {
    const missing = path.join(tmpDir, 'missing');

    expect(() => loadLevels(missing)).toThrow(TrainerError);
    try {
      loadLevels(missing);
    } catch (error) {
      expect(TrainerError.isCode(error, 'TRAINER_L100')).toBe(true);
    }
  });
});

describe('loadLevelsFromRecords', () => {
  it('validates and orders in-memory records', () => {
    const { levels, issues } = loadLevelsFromRecords([
      { number: 3, expected_command: 'date' },
      { number: 1, expected_command: 'pwd' },
      { title: 'no number' },
    ]);

    expect(levels.map((level) => level.expectedCommand)).toEqual(['pwd', 'date']);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.file).toBe('record[2]');
  });

  it('strips unknown keys', () => {
    const { levels } = loadLevelsFromRecords([
      { number: 1, expected_command: 'pwd', difficulty: 'easy' },
    ]);

    expect(Object.keys(levels[0] ?? {})).toEqual([
      'ordinal',
      'title',
      'description',
      'expectedCommand',
      'hint',
    ]);
  });
});
