/**
 * @module @shell-trainer/core
 *
 * Level model, answer checking and the training session state machine
 * behind the shell-trainer CLI. Contains no terminal I/O.
 */

// Levels
export {
  formatSchemaIssues,
  levelFileSchema,
  sortLevels,
  toLevel,
  type Level,
  type LevelFile,
} from './levels/level.js';
export {
  loadLevels,
  loadLevelsFromRecords,
  type LevelLoadIssue,
  type LoadLevelsOptions,
  type LoadLevelsResult,
} from './levels/loader.js';

// Checking
export { checkCommand, getBaseCommand, normalizeCommand } from './checker.js';

// Session
export {
  TrainerSession,
  createTrainerSession,
  type SessionEvent,
  type SessionState,
  type SubmitOutcome,
  type TrainerSessionOptions,
} from './session.js';

// Output
export { createAttemptLog, formatLogLine, type AttemptLog } from './attempt-log.js';
export {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_SAFE_COMMANDS,
  createCommandRunner,
  isSafeCommand,
  type CommandRunResult,
  type CommandRunner,
  type CommandRunnerOptions,
  type SpawnFn,
  type SpawnResult,
} from './command-runner.js';

// Errors and logging
export * from './errors/index.js';
export * from './observability/index.js';
