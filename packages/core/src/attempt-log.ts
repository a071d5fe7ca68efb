/**
 * Attempt Log — append-only text record of a training session.
 *
 * The log is write-only output: one line per input and a start/end line
 * per session. It is never read back by the trainer.
 *
 * @module attempt-log
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Observable, Subscription } from 'rxjs';
import { TrainerError } from './errors/index.js';
import type { SessionEvent } from './session.js';

export interface AttemptLog {
  /** Absolute path of the log file */
  readonly filePath: string;
  /** Write one line per relevant session event until the stream completes. */
  attach(events$: Observable<SessionEvent>): Subscription;
  /** Append a free-form line. */
  write(line: string): void;
  /** Flush pending writes and close the file. */
  close(): Promise<void>;
}

/**
 * Render a session event as a log line, or `null` for events that are not logged.
 */
export function formatLogLine(event: SessionEvent): string | null {
  switch (event.type) {
    case 'session-started':
      return `Session started at ${new Date(event.timestamp).toISOString()}`;
    case 'input':
      return `Level ${event.level.ordinal} input: ${event.input}`;
    case 'exited':
      return 'User exited the session.';
    case 'session-ended':
      return `Session ended at ${new Date(event.timestamp).toISOString()}`;
    default:
      return null;
  }
}

function logError(filePath: string, error: unknown): TrainerError {
  return new TrainerError({
    code: 'TRAINER_A500',
    message: `Attempt log could not be written: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
    context: { filePath },
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Open (or create) a log file for appending.
 *
 * The file is opened before this returns, so a path that cannot be written
 * fails here rather than later on the stream.
 *
 * @throws TrainerError `TRAINER_A500` when the file cannot be opened
 */
export function createAttemptLog(filePath: string): AttemptLog {
  const absolutePath = path.resolve(filePath);

  let fd: number;
  try {
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    fd = fs.openSync(absolutePath, 'a');
  } catch (error) {
    throw logError(absolutePath, error);
  }

  const stream = fs.createWriteStream(absolutePath, { fd, encoding: 'utf-8' });
  let failure: TrainerError | null = null;
  let closed = false;

  stream.on('error', (error) => {
    failure ??= logError(absolutePath, error);
  });

  function write(line: string): void {
    if (closed || failure) return;
    stream.write(`${line}\n`);
  }

  function attach(events$: Observable<SessionEvent>): Subscription {
    return events$.subscribe((event) => {
      const line = formatLogLine(event);
      if (line !== null) write(line);
    });
  }

  function close(): Promise<void> {
    if (closed) return Promise.resolve();
    closed = true;
    if (failure) {
      stream.destroy();
      return Promise.reject(failure);
    }
    return new Promise((resolve, reject) => {
      stream.once('error', (error) => reject(failure ?? logError(absolutePath, error)));
      stream.once('finish', () => resolve());
      stream.end();
    });
  }

  return { filePath: absolutePath, attach, write, close };
}
