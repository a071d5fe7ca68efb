/**
 * Diagnostic logging for the trainer.
 *
 * Learner-facing text goes to stdout through the CLI. Diagnostics (skipped
 * level files, spawn failures, the configuration in use) go to a separate
 * sink, stderr by default, so they never interleave with a lesson.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  /** Dotted path of the component that logged, e.g. `shell-trainer.runner` */
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
  /** Logger with the same level and sink, tagged with a sub-context */
  child(context: string): Logger;
}

/**
 * Where formatted lines are written
 */
export interface LogSink {
  write(text: string): void;
}

export interface LoggerOptions {
  /** Minimum level written (default: `info`) */
  level?: LogLevel;
  context?: string;
  /** Receives every entry at or above `level`; replaces the formatted sink output */
  handler?: (entry: LogEntry) => void;
  /** Sink for formatted lines (default: process.stderr) */
  sink?: LogSink;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Render an entry as one line: `<iso> <LEVEL>[<context>] <message> <data> <error>`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [
    `${new Date(entry.timestamp).toISOString()} ${entry.level.toUpperCase()}${entry.context ? `[${entry.context}]` : ''}`,
    entry.message,
  ];
  if (entry.data) parts.push(JSON.stringify(entry.data));
  if (entry.error) parts.push(`(${entry.error.message})`);
  return parts.join(' ');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', context, handler, sink = process.stderr } = options;
  const minPriority = LOG_LEVEL_PRIORITY[level];

  const emit =
    handler ??
    ((entry: LogEntry): void => {
      sink.write(`${formatLogEntry(entry)}\n`);
    });

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;
    emit({ level: logLevel, message, timestamp: Date.now(), context, data, error });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, error, data) => log('error', message, data, error),
    child: (childContext) =>
      createLogger({
        ...options,
        context: context ? `${context}.${childContext}` : childContext,
      }),
  };
}

/**
 * Logger that drops everything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
