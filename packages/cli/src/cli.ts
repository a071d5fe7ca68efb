#!/usr/bin/env node
/**
 * @shell-trainer/cli - Command Line Interface
 *
 * The main entry point for the shell-trainer CLI tool.
 *
 * @module @shell-trainer/cli
 */

import { TrainerError } from '@shell-trainer/core';
import { integerFlag, parseArgs, stringFlag, type ParsedArgs } from './args.js';
import { doctor } from './commands/doctor.js';
import { listLevels } from './commands/levels.js';
import { train } from './commands/train.js';

/**
 * CLI version
 */
const VERSION = '0.1.0';

/**
 * Print main help message
 */
function printHelp(): void {
  console.log(`
shell-trainer - Learn Linux shell commands one level at a time

Usage: shell-trainer [command] [options]

Commands:
  train                   Start an interactive session (default)
  levels                  List the available levels
  doctor                  Check level files and configuration

Options:
  --levels <dir>          Directory of level JSON files
  --log <file>            Attempt log file (default: ./logs/commands.log)
  --start <n>             Begin at level number <n>
  --no-run                Do not run correct commands to show their output
  --no-color              Disable coloured output
  --verbose               Print diagnostic logging
  --quiet                 (doctor) Only show problems
  --help, -h              Show help
  --version, -v           Show version

While training, type 'hint' for a hint and 'exit' or 'quit' to leave.

Examples:
  shell-trainer                          Start from the first level
  shell-trainer train --start 5          Jump to level 5
  shell-trainer levels                   See every level
  shell-trainer train --levels ./class   Use your own level files
  shell-trainer doctor                   Validate your setup
`);
}

/**
 * Print version
 */
function printVersion(): void {
  console.log(`shell-trainer v${VERSION}`);
}

function colorFlag(args: ParsedArgs): boolean | undefined {
  return args.flags['no-color'] === true ? false : undefined;
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  // Handle global flags
  if (args.flags.help || args.flags.h) {
    printHelp();
    process.exit(0);
  }

  if (args.flags.version || args.flags.v) {
    printVersion();
    process.exit(0);
  }

  try {
    switch (args.command) {
      case '':
      case 'train': {
        const result = await train({
          levelsDir: stringFlag(args, 'levels'),
          logFile: stringFlag(args, 'log'),
          startAt: integerFlag(args, 'start'),
          runCommands: args.flags['no-run'] === true ? false : undefined,
          color: colorFlag(args),
          verbose: args.flags.verbose === true,
        });
        if (result.status === 'no-levels') {
          process.exit(1);
        }
        break;
      }

      case 'levels':
        listLevels({
          levelsDir: stringFlag(args, 'levels'),
          color: colorFlag(args),
        });
        break;

      case 'doctor': {
        const report = doctor({
          levelsDir: stringFlag(args, 'levels'),
          logFile: stringFlag(args, 'log'),
          quiet: args.flags.quiet === true,
          color: colorFlag(args),
        });
        if (report.failed > 0) {
          process.exit(1);
        }
        break;
      }

      default:
        console.error(`Unknown command: ${args.command}`);
        console.error('Run "shell-trainer --help" for usage information');
        process.exit(1);
    }
  } catch (error) {
    if (TrainerError.isTrainerError(error)) {
      console.error(error.formatTerminal());
    } else {
      console.error('Error:', error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
  }
}

// Run CLI
void main();
