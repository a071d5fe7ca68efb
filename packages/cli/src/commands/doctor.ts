/**
 * @shell-trainer/cli - Doctor Command
 *
 * Checks that the configuration and level files are usable before a class
 * starts a session.
 *
 * @module @shell-trainer/cli/commands
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TrainerError, loadLevels, type LoadLevelsResult } from '@shell-trainer/core';
import { resolveConfig } from '../config/loader.js';
import type { ResolvedConfig } from '../config/types.js';
import { println, type OutputSink } from '../terminal/io.js';
import { createStyle, type Style } from '../terminal/style.js';

/**
 * Doctor options
 */
export interface DoctorOptions {
  /** Working directory */
  cwd?: string;
  levelsDir?: string;
  logFile?: string;
  /** Only output issues, no success messages */
  quiet?: boolean;
  color?: boolean;
  output?: OutputSink;
  env?: NodeJS.ProcessEnv;
  /** Node.js version to check (default: the running one) */
  nodeVersion?: string;
}

/**
 * Check result type
 */
export interface CheckResult {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  suggestion?: string;
}

export interface DoctorReport {
  checks: CheckResult[];
  passed: number;
  warnings: number;
  failed: number;
}

function checkNodeVersion(version: string): CheckResult {
  const [major] = version.split('.').map(Number);

  if ((major ?? 0) >= 20) {
    return {
      name: 'Node.js Version',
      status: 'pass',
      message: `Node.js v${version} (>=20 required)`,
    };
  } else if ((major ?? 0) >= 18) {
    return {
      name: 'Node.js Version',
      status: 'warn',
      message: `Node.js v${version} - Consider upgrading to v20+`,
      suggestion: 'shell-trainer is tested on Node.js 20.',
    };
  } else {
    return {
      name: 'Node.js Version',
      status: 'fail',
      message: `Node.js v${version} is not supported`,
      suggestion: 'Please upgrade to Node.js 20 or later.',
    };
  }
}

function checkLevels(config: ResolvedConfig): CheckResult[] {
  const dirName = path.basename(config.levelsDir);

  let result: LoadLevelsResult;
  try {
    result = loadLevels(config.levelsDir);
  } catch (error) {
    return [
      {
        name: 'Levels',
        status: 'fail',
        message: error instanceof Error ? error.message : String(error),
        suggestion: TrainerError.isTrainerError(error) ? error.suggestion : undefined,
      },
    ];
  }

  const checks: CheckResult[] = [];

  if (result.levels.length === 0) {
    checks.push({
      name: 'Levels',
      status: 'fail',
      message: `No levels found in ${dirName}/`,
      suggestion: 'Create one JSON file per level in the levels directory.',
    });
  } else {
    const first = result.levels[0]?.ordinal;
    const last = result.levels[result.levels.length - 1]?.ordinal;
    checks.push({
      name: 'Levels',
      status: 'pass',
      message: `Found ${result.levels.length} level(s) in ${dirName}/ (numbers ${first}-${last})`,
    });
  }

  if (result.issues.length > 0) {
    const [firstIssue] = result.issues;
    checks.push({
      name: 'Level Files',
      status: 'warn',
      message: `${result.issues.length} file(s) will be skipped: ${firstIssue?.error.message ?? ''}`,
      suggestion: firstIssue?.error.suggestion,
    });
  } else {
    checks.push({
      name: 'Level Files',
      status: 'pass',
      message: 'All level files are valid',
    });
  }

  return checks;
}

function checkLogFile(logFile: string): CheckResult {
  let dir = path.dirname(logFile);
  while (!fs.existsSync(dir)) {
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  try {
    fs.accessSync(dir, fs.constants.W_OK);
    return {
      name: 'Attempt Log',
      status: 'pass',
      message: `Writable: ${logFile}`,
    };
  } catch {
    return {
      name: 'Attempt Log',
      status: 'fail',
      message: `Cannot write to ${dir}`,
      suggestion: 'Pass --log <file> with a writable location.',
    };
  }
}

/**
 * Format check result for display
 */
function formatResult(result: CheckResult, quiet: boolean, style: Style): string {
  const icon =
    result.status === 'pass'
      ? style.green('✓')
      : result.status === 'warn'
        ? style.yellow('⚠')
        : style.red('✗');

  if (quiet && result.status === 'pass') {
    return '';
  }

  let output = `  ${icon} ${result.name}: ${result.message}`;

  if (result.suggestion) {
    output += `\n    ${style.dim(result.suggestion)}`;
  }

  return output;
}

/**
 * Run health checks on the trainer setup
 *
 * @param options - Doctor options
 * @returns The checks that ran and their tally
 */
export function doctor(options: DoctorOptions = {}): DoctorReport {
  const output = options.output ?? process.stdout;
  const quiet = options.quiet ?? false;
  const checks: CheckResult[] = [checkNodeVersion(options.nodeVersion ?? process.versions.node)];

  let config: ResolvedConfig | null = null;
  try {
    config = resolveConfig({
      cwd: options.cwd,
      overrides: { levelsDir: options.levelsDir, logFile: options.logFile, color: options.color },
      env: options.env,
    });
    checks.push({
      name: 'Configuration',
      status: 'pass',
      message: config.configPath
        ? `Valid configuration at ${config.configPath}`
        : 'No shell-trainer.config.json found, using defaults',
    });
  } catch (error) {
    checks.push({
      name: 'Configuration',
      status: 'fail',
      message: error instanceof Error ? error.message : String(error),
      suggestion: TrainerError.isTrainerError(error) ? error.suggestion : undefined,
    });
  }

  if (config) {
    checks.push(...checkLevels(config));
    checks.push(checkLogFile(config.logFile));
  }

  const style = createStyle(config?.color ?? options.color ?? false);

  println(output, `\n${style.bold('shell-trainer doctor')} - Checking setup...\n`);
  for (const result of checks) {
    const formatted = formatResult(result, quiet, style);
    if (formatted) {
      println(output, formatted);
    }
  }

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warnings = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  println(output, `\n${style.bold('Summary:')}`);
  println(
    output,
    `  ${style.green(`${passed} passed`)}, ${style.yellow(`${warnings} warnings`)}, ${style.red(`${failed} failed`)}\n`
  );

  if (failed > 0) {
    println(output, style.red('Some checks failed. Please fix the issues above.'));
  } else if (warnings > 0) {
    println(output, style.yellow('All critical checks passed with some warnings.'));
  } else {
    println(output, style.green('All checks passed! The trainer is ready.'));
  }

  return { checks, passed, warnings, failed };
}
