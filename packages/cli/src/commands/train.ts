/**
 * @shell-trainer/cli - Train Command
 *
 * The interactive session: presents each level, reads answers, gives
 * hints on request and advances on a correct answer.
 *
 * @module @shell-trainer/cli/commands
 */

import {
  createAttemptLog,
  createCommandRunner,
  createLogger,
  createTrainerSession,
  formatLogLine,
  loadLevels,
  type CommandRunResult,
  type CommandRunner,
  type Level,
  type Logger,
} from '@shell-trainer/core';
import { resolveConfig, type ConfigOverrides } from '../config/loader.js';
import { createReadlinePrompter, println, type OutputSink, type Prompter } from '../terminal/io.js';
import { createStyle, type Style } from '../terminal/style.js';

/**
 * Train options
 */
export interface TrainOptions extends ConfigOverrides {
  /** Working directory */
  cwd?: string;
  /** Ordinal of the level to begin with */
  startAt?: number;
  /** Log diagnostics at debug level */
  verbose?: boolean;
  /** Line source (default: stdin) */
  prompter?: Prompter;
  /** Text sink (default: stdout) */
  output?: OutputSink;
  /** Command runner (default: built from configuration) */
  runner?: CommandRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * How a training session ended
 */
export interface TrainResult {
  status: 'completed' | 'exited' | 'no-levels';
  /** Ordinals of the levels passed in this session */
  completedLevels: readonly number[];
  logFile: string;
}

const INCORRECT_MESSAGE = "Oops, that's not the right command. Try again or type 'hint' for help.";
const GOODBYE_MESSAGE = 'Exiting the trainer. Goodbye!';

function printWelcome(output: OutputSink, style: Style): void {
  println(output, style.bold('Welcome to shell-trainer!'));
  println(output, 'This interactive program helps you practise common Linux commands.');
  println(output, "Type the command you think solves the current level, or type 'hint' for help.");
  println(output, "You can leave the trainer at any time by typing 'exit' or 'quit'.");
  println(output);
}

function printLevel(output: OutputSink, style: Style, level: Level): void {
  println(output, style.bold(`** Level ${level.ordinal}: ${level.title} **`));
  if (level.description) {
    println(output, level.description);
  }
}

function printRunResult(output: OutputSink, style: Style, result: CommandRunResult): void {
  switch (result.kind) {
    case 'skipped':
      println(output, style.cyan('(Command execution skipped for safety.)'));
      break;
    case 'executed':
      if (result.stdout) println(output, result.stdout);
      if (result.stderr) println(output, style.red(result.stderr));
      break;
    case 'failed':
      println(output, style.dim(result.error.suggestion ?? result.error.message));
      break;
  }
}

/**
 * Run an interactive training session
 *
 * @param options - Train options
 * @returns How the session ended
 */
export async function train(options: TrainOptions = {}): Promise<TrainResult> {
  const config = resolveConfig({ cwd: options.cwd, overrides: options, env: options.env });
  const output: OutputSink = options.output ?? process.stdout;
  const style = createStyle(config.color);
  const logger =
    options.logger ??
    createLogger({ level: options.verbose ? 'debug' : 'error', context: 'shell-trainer' });

  logger.debug('Configuration resolved', {
    configPath: config.configPath,
    levelsDir: config.levelsDir,
    logFile: config.logFile,
  });

  const { levels, issues } = loadLevels(config.levelsDir, { logger: logger.child('levels') });
  for (const issue of issues) {
    println(output, style.red(issue.error.message));
  }

  if (levels.length === 0) {
    const log = createAttemptLog(config.logFile);
    const started = formatLogLine({ type: 'session-started', timestamp: Date.now() });
    if (started) log.write(started);
    log.write('No levels loaded. Exiting.');
    await log.close();
    println(
      output,
      style.red('No levels found. Please create JSON files in the levels directory.')
    );
    return { status: 'no-levels', completedLevels: [], logFile: log.filePath };
  }

  const session = createTrainerSession(levels, { startAt: options.startAt });
  const log = createAttemptLog(config.logFile);
  const runner =
    options.runner ??
    createCommandRunner({
      safeCommands: config.safeCommands,
      timeoutMs: config.commandTimeoutMs,
      logger: logger.child('runner'),
    });
  const prompter = options.prompter ?? createReadlinePrompter();

  log.attach(session.events$);
  session.start();
  printWelcome(output, style);

  let status: TrainResult['status'] = 'exited';
  let shown: Level | null = null;

  try {
    while (true) {
      const level = session.currentLevel;
      if (!level) {
        status = 'completed';
        break;
      }

      if (level !== shown) {
        printLevel(output, style, level);
        shown = level;
      }

      const line = await prompter.ask('> ');
      if (line === null) {
        println(output);
        println(output, GOODBYE_MESSAGE);
        break;
      }

      const outcome = session.submit(line);
      if (outcome.kind === 'exit') {
        println(output, GOODBYE_MESSAGE);
        break;
      }

      switch (outcome.kind) {
        case 'hint':
          println(
            output,
            style.yellow(
              outcome.hint ? `Hint: ${outcome.hint}` : 'No hint available for this level.'
            )
          );
          break;
        case 'incorrect':
          println(output, style.red(INCORRECT_MESSAGE));
          break;
        case 'correct':
          println(output, style.green('Correct! Well done.'));
          if (config.runCommands) {
            printRunResult(output, style, runner.run(outcome.command));
          }
          println(output);
          break;
      }
    }

    if (status === 'completed') {
      println(output, style.bold(style.green('Congratulations! You have completed all the levels!')));
      println(output, "You've learned a variety of Linux commands. Keep practising!");
    }
  } finally {
    session.end();
    prompter.close();
    await log.close();
  }

  logger.debug('Session finished', { status, completedLevels: session.state.completedLevels });

  return { status, completedLevels: session.state.completedLevels, logFile: log.filePath };
}
