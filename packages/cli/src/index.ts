/**
 * @shell-trainer/cli - Programmatic API
 *
 * The shell-trainer CLI and the pieces it is built from, for embedding a
 * training session in another tool or driving one from a script.
 *
 * @example Running a session against custom levels
 * ```typescript
 * import { train } from '@shell-trainer/cli';
 *
 * const result = await train({ levelsDir: './classroom-levels', runCommands: false });
 * console.log(result.status, result.completedLevels);
 * ```
 *
 * @module @shell-trainer/cli
 */

// Configuration
export { trainerConfigSchema } from './config/types.js';
export type { ResolvedConfig, TrainerConfig } from './config/types.js';
export {
  CONFIG_FILE,
  findConfigFile,
  loadConfig,
  loadProjectConfig,
  resolveConfig,
  type ConfigOverrides,
  type ResolveConfigOptions,
} from './config/loader.js';
export { BUNDLED_LEVELS_DIR } from './paths.js';

// Commands
export { train, type TrainOptions, type TrainResult } from './commands/train.js';
export { listLevels, type LevelsOptions } from './commands/levels.js';
export { doctor, type CheckResult, type DoctorOptions, type DoctorReport } from './commands/doctor.js';

// Terminal
export { parseArgs, type ParsedArgs } from './args.js';
export { createReadlinePrompter, type OutputSink, type Prompter } from './terminal/io.js';
export { createStyle, type Style } from './terminal/style.js';
