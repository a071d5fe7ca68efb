/**
 * @shell-trainer/cli - Configuration Types
 *
 * Type definitions for shell-trainer.config.json.
 *
 * @module @shell-trainer/cli/config
 */

import { z } from 'zod';

/**
 * Schema of shell-trainer.config.json. Every field is optional.
 */
export const trainerConfigSchema = z
  .object({
    /** Directory of level JSON files, relative to the config file */
    levelsDir: z.string().min(1),
    /** Attempt log path, relative to the config file */
    logFile: z.string().min(1),
    /** Run safe commands after a correct answer */
    runCommands: z.boolean(),
    /** Commands considered safe to run */
    safeCommands: z.array(z.string().min(1)),
    /** Timeout for a command run, in milliseconds */
    commandTimeoutMs: z.number().int().positive(),
    /** Colour output */
    color: z.boolean(),
  })
  .partial()
  .strict();

/**
 * shell-trainer configuration file contents
 */
export type TrainerConfig = z.infer<typeof trainerConfigSchema>;

/**
 * Configuration with every default applied and paths made absolute
 */
export interface ResolvedConfig {
  levelsDir: string;
  logFile: string;
  runCommands: boolean;
  safeCommands: readonly string[];
  commandTimeoutMs: number;
  color: boolean;
  /** The file the configuration came from, or null when only defaults apply */
  configPath: string | null;
}
