/**
 * @shell-trainer/cli - Configuration Loader
 *
 * Discovers and loads shell-trainer.config.json configuration files.
 *
 * @module @shell-trainer/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_SAFE_COMMANDS,
  TrainerError,
  formatSchemaIssues,
} from '@shell-trainer/core';
import { BUNDLED_LEVELS_DIR } from '../paths.js';
import { trainerConfigSchema, type ResolvedConfig, type TrainerConfig } from './types.js';

/**
 * Configuration file name searched for
 */
export const CONFIG_FILE = 'shell-trainer.config.json';

/**
 * Default attempt log location, relative to the working directory
 */
export const DEFAULT_LOG_FILE = path.join('logs', 'commands.log');

/**
 * Values given on the command line; they win over the file
 */
export interface ConfigOverrides {
  levelsDir?: string;
  logFile?: string;
  runCommands?: boolean;
  color?: boolean;
}

export interface ResolveConfigOptions {
  cwd?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

/**
 * Find a configuration file in the current directory or parents
 *
 * @param startDir - Directory to start searching from
 * @returns Path to config file, or null if not found
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load and validate a configuration file
 *
 * @throws TrainerError `TRAINER_C400` when the file is unreadable or invalid
 */
export function loadConfig(configPath: string): TrainerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new TrainerError({
      code: 'TRAINER_C400',
      message: `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      context: { configPath },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = trainerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TrainerError({
      code: 'TRAINER_C400',
      message: `Invalid config ${configPath}: ${formatSchemaIssues(parsed.error)}`,
      context: { configPath },
    });
  }

  return parsed.data;
}

/**
 * Load configuration from the project root
 *
 * @returns The loaded configuration and its path, or null if not found
 */
export function loadProjectConfig(
  cwd: string = process.cwd()
): { config: TrainerConfig; configPath: string } | null {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return null;
  }

  return { config: loadConfig(configPath), configPath };
}

/**
 * Merge defaults, the configuration file and command-line overrides.
 *
 * Paths from the file resolve against the file's directory; paths from
 * the command line resolve against `cwd`.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const project = loadProjectConfig(cwd);
  const fileConfig = project?.config ?? {};
  const fileDir = project ? path.dirname(project.configPath) : cwd;

  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(fileDir, value);
  const fromCli = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(cwd, value);

  return {
    levelsDir:
      fromCli(overrides.levelsDir) ?? fromFile(fileConfig.levelsDir) ?? BUNDLED_LEVELS_DIR,
    logFile:
      fromCli(overrides.logFile) ??
      fromFile(fileConfig.logFile) ??
      path.resolve(cwd, DEFAULT_LOG_FILE),
    runCommands: overrides.runCommands ?? fileConfig.runCommands ?? true,
    safeCommands: fileConfig.safeCommands ?? DEFAULT_SAFE_COMMANDS,
    commandTimeoutMs: fileConfig.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    color: overrides.color ?? fileConfig.color ?? env.NO_COLOR === undefined,
    configPath: project?.configPath ?? null,
  };
}
