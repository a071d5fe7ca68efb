/**
 * Level model and the schema of level files on disk.
 *
 * @module levels/level
 */

import { z } from 'zod';

/**
 * A single exercise. Immutable once loaded.
 */
export interface Level {
  /** Unique ordinal; defines the order levels are presented in */
  readonly ordinal: number;
  readonly title: string;
  readonly description: string;
  /** The answer the learner is expected to type */
  readonly expectedCommand: string;
  /** Shown when the learner types `hint`; empty when the level has none */
  readonly hint: string;
}

/**
 * Schema for a level JSON file. Unknown keys are stripped.
 */
export const levelFileSchema = z.object({
  number: z.number().int(),
  title: z.string().optional(),
  description: z.string().optional(),
  expected_command: z.string().trim().min(1, 'expected_command must not be empty'),
  hint: z.string().optional(),
});

/** A level record as written on disk */
export type LevelFile = z.infer<typeof levelFileSchema>;

/**
 * Convert a validated level file into a Level, filling defaults.
 */
export function toLevel(record: LevelFile): Level {
  return {
    ordinal: record.number,
    title: record.title ?? `Level ${record.number}`,
    description: record.description ?? '',
    expectedCommand: record.expected_command,
    hint: record.hint ?? '',
  };
}

/**
 * Return a new array of levels ordered by ascending ordinal.
 */
export function sortLevels(levels: readonly Level[]): Level[] {
  return [...levels].sort((a, b) => a.ordinal - b.ordinal);
}

/**
 * Render zod issues as `path: message` pairs.
 */
export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
