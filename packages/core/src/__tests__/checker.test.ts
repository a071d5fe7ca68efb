import { describe, expect, it } from 'vitest';
import { checkCommand, getBaseCommand, normalizeCommand } from '../checker.js';

describe('normalizeCommand', () => {
  it('trims and collapses whitespace', () => {
    expect(normalizeCommand('  ls   -l\t -a  ')).toBe('ls -l -a');
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeCommand('   ')).toBe('');
  });
});

describe('getBaseCommand', () => {
  it('returns the first word', () => {
    expect(getBaseCommand('  echo hello world')).toBe('echo');
  });

  it('returns an empty string for blank input', () => {
    expect(getBaseCommand('')).toBe('');
  });
});

describe('checkCommand', () => {
  it('accepts an exact match', () => {
    expect(checkCommand('pwd', 'pwd')).toBe(true);
  });

  it('ignores extra whitespace', () => {
    expect(checkCommand('  mkdir    projects ', 'mkdir projects')).toBe(true);
  });

  it('is case sensitive', () => {
    expect(checkCommand('PWD', 'pwd')).toBe(false);
  });

  it('rejects when nothing is expected', () => {
    expect(checkCommand('pwd', '')).toBe(false);
    expect(checkCommand('pwd', null)).toBe(false);
    expect(checkCommand('pwd', undefined)).toBe(false);
  });

  it('rejects a different command', () => {
    expect(checkCommand('cd projects', 'mkdir projects')).toBe(false);
  });

  it('rejects partial answers', () => {
    expect(checkCommand('mkdir', 'mkdir projects')).toBe(false);
  });

  describe('ls variations', () => {
    it('accepts ls with arguments when ls is expected', () => {
      expect(checkCommand('ls -l', 'ls')).toBe(true);
      expect(checkCommand('ls .', 'ls')).toBe(true);
      expect(checkCommand('ls --all', 'ls')).toBe(true);
    });

    it('does not relax an expected ls with arguments', () => {
      expect(checkCommand('ls', 'ls -a')).toBe(false);
      expect(checkCommand('ls -l', 'ls -a')).toBe(false);
    });

    it('does not accept commands that merely start with ls', () => {
      expect(checkCommand('lsblk', 'ls')).toBe(false);
    });
  });

  describe('history variations', () => {
    it('accepts history with a count', () => {
      expect(checkCommand('history 5', 'history')).toBe(true);
    });
  });

  describe('editor variations', () => {
    it('accepts vi for the same file', () => {
      expect(checkCommand('vi notes.txt', 'nano notes.txt')).toBe(true);
    });

    it('accepts nano with extra spaces', () => {
      expect(checkCommand('nano   notes.txt', 'nano notes.txt')).toBe(true);
    });

    it('rejects a different file', () => {
      expect(checkCommand('vi todo.txt', 'nano notes.txt')).toBe(false);
    });

    it('rejects an editor without a file', () => {
      expect(checkCommand('vi', 'nano notes.txt')).toBe(false);
    });

    it('rejects other editors', () => {
      expect(checkCommand('emacs notes.txt', 'nano notes.txt')).toBe(false);
    });
  });
});
