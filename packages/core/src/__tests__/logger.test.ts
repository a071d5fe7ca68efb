import { describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  formatLogEntry,
  noopLogger,
  type LogEntry,
  type LogSink,
} from '../observability/index.js';

const AT = Date.UTC(2024, 0, 15, 9, 30, 0);

function createSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(text: string): void {
      lines.push(text);
    },
  };
}

describe('formatLogEntry', () => {
  it('renders level, context, message and data on one line', () => {
    expect(
      formatLogEntry({
        level: 'warn',
        message: 'Skipping level broken.json',
        timestamp: AT,
        context: 'shell-trainer.levels',
        data: { code: 'TRAINER_L101' },
      })
    ).toBe(
      '2024-01-15T09:30:00.000Z WARN[shell-trainer.levels] Skipping level broken.json {"code":"TRAINER_L101"}'
    );
  });

  it('appends the error message', () => {
    expect(
      formatLogEntry({ level: 'error', message: 'failed', timestamp: AT, error: new Error('boom') })
    ).toBe('2024-01-15T09:30:00.000Z ERROR failed (boom)');
  });
});

describe('createLogger', () => {
  it('writes to the sink at or above the minimum level', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(sink.lines).toHaveLength(2);
    expect(sink.lines[0]).toMatch(/ WARN warn message\n$/);
    expect(sink.lines[1]).toMatch(/ ERROR error message\n$/);
  });

  it('writes debug output when asked to, whatever NODE_ENV says', () => {
    vi.stubEnv('NODE_ENV', 'production');
    try {
      const sink = createSink();
      createLogger({ level: 'debug', sink }).debug('Configuration resolved');

      expect(sink.lines).toHaveLength(1);
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it('passes structured entries to a custom handler', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({
      level: 'debug',
      context: 'runner',
      handler: (entry) => entries.push(entry),
    });
    const failure = new Error('spawn failed');

    logger.debug('running', { command: 'pwd' });
    logger.error('could not run', failure, { command: 'history' });

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 'debug',
      message: 'running',
      context: 'runner',
      data: { command: 'pwd' },
    });
    expect(entries[1]?.error).toBe(failure);
    expect(entries[1]?.data).toEqual({ command: 'history' });
  });

  it('nests child contexts and keeps the level', () => {
    const entries: LogEntry[] = [];
    const root = createLogger({
      level: 'warn',
      context: 'shell-trainer',
      handler: (entry) => entries.push(entry),
    });
    const child = root.child('runner');

    child.debug('hidden');
    child.warn('shown');

    expect(entries.map((entry) => [entry.context, entry.message])).toEqual([
      ['shell-trainer.runner', 'shown'],
    ]);
  });
});

describe('noopLogger', () => {
  it('returns itself for children', () => {
    expect(noopLogger.child('runner')).toBe(noopLogger);
  });
});
