/**
 * @shell-trainer/cli - Levels Command
 *
 * Lists the levels a session would present.
 *
 * @module @shell-trainer/cli/commands
 */

import { loadLevels, type Level } from '@shell-trainer/core';
import { resolveConfig } from '../config/loader.js';
import { println, type OutputSink } from '../terminal/io.js';
import { createStyle } from '../terminal/style.js';

/**
 * Levels options
 */
export interface LevelsOptions {
  /** Working directory */
  cwd?: string;
  levelsDir?: string;
  color?: boolean;
  output?: OutputSink;
  env?: NodeJS.ProcessEnv;
}

/**
 * Print every loaded level as `<number>. <title>`
 *
 * @returns The listed levels
 */
export function listLevels(options: LevelsOptions = {}): readonly Level[] {
  const config = resolveConfig({
    cwd: options.cwd,
    overrides: { levelsDir: options.levelsDir, color: options.color },
    env: options.env,
  });
  const output = options.output ?? process.stdout;
  const style = createStyle(config.color);
  const { levels, issues } = loadLevels(config.levelsDir);

  if (levels.length === 0) {
    println(output, style.red(`No levels found in ${config.levelsDir}`));
  }

  for (const level of levels) {
    println(output, `${level.ordinal}. ${level.title}`);
  }

  if (issues.length > 0) {
    println(output);
    println(
      output,
      style.yellow(`${issues.length} level file(s) skipped. Run "shell-trainer doctor" for details.`)
    );
  }

  return levels;
}
