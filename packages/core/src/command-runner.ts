/**
 * Command Runner — runs a correct answer to show its real output.
 *
 * Only commands whose first word is in the safe list are run. The input is
 * split on whitespace and handed to the program directly, without a shell.
 * This is not a sandbox.
 *
 * @module command-runner
 */

import { spawnSync } from 'node:child_process';
import { TrainerError } from './errors/index.js';
import { noopLogger, type Logger } from './observability/index.js';
import { getBaseCommand, normalizeCommand } from './checker.js';

/** Commands that only read state and are run after a correct answer */
export const DEFAULT_SAFE_COMMANDS: readonly string[] = [
  'pwd',
  'ls',
  'whoami',
  'echo',
  'clear',
  'date',
  'history',
];

export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

/** Raw result of spawning a process */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  status: number | null;
  error?: Error;
}

/** Spawns a program synchronously; swapped out in tests */
export type SpawnFn = (command: string, args: string[], timeoutMs: number) => SpawnResult;

export type CommandRunResult =
  | { readonly kind: 'skipped'; readonly command: string }
  | {
      readonly kind: 'executed';
      readonly command: string;
      readonly stdout: string;
      readonly stderr: string;
      readonly exitCode: number | null;
    }
  | { readonly kind: 'failed'; readonly command: string; readonly error: TrainerError };

export interface CommandRunnerOptions {
  safeCommands?: readonly string[];
  timeoutMs?: number;
  logger?: Logger;
  spawn?: SpawnFn;
}

export interface CommandRunner {
  readonly safeCommands: ReadonlySet<string>;
  run(input: string): CommandRunResult;
}

const defaultSpawn: SpawnFn = (command, args, timeoutMs) => {
  const result = spawnSync(command, args, { encoding: 'utf-8', timeout: timeoutMs });
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    status: result.status,
    error: result.error,
  };
};

/**
 * Whether the first word of `input` is in the safe set.
 */
export function isSafeCommand(input: string, safeCommands: ReadonlySet<string>): boolean {
  const base = getBaseCommand(input);
  return base !== '' && safeCommands.has(base);
}

export function createCommandRunner(options: CommandRunnerOptions = {}): CommandRunner {
  const safeCommands: ReadonlySet<string> = new Set(options.safeCommands ?? DEFAULT_SAFE_COMMANDS);
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const logger = options.logger ?? noopLogger;
  const spawn = options.spawn ?? defaultSpawn;

  function run(input: string): CommandRunResult {
    const command = normalizeCommand(input);

    if (!isSafeCommand(command, safeCommands)) {
      logger.debug('Command not in safe list', { command });
      return { kind: 'skipped', command };
    }

    const [program = '', ...args] = command.split(' ');
    const result = spawn(program, args, timeoutMs);

    if (result.error) {
      const error = TrainerError.wrap(result.error, 'TRAINER_R300', { command });
      logger.warn(`Could not run "${command}": ${result.error.message}`, { code: error.code });
      return { kind: 'failed', command, error };
    }

    logger.debug('Command executed', { command, exitCode: result.status });

    return {
      kind: 'executed',
      command,
      stdout: result.stdout.trim(),
      stderr: result.stderr.trim(),
      exitCode: result.status,
    };
  }

  return { safeCommands, run };
}
