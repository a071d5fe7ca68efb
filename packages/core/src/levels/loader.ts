/**
 * Level Loader
 *
 * Reads one JSON file per level from a directory. Broken files are
 * reported as issues and skipped so a single typo does not stop a class.
 *
 * @module levels/loader
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TrainerError } from '../errors/index.js';
import { noopLogger, type Logger } from '../observability/index.js';
import { formatSchemaIssues, levelFileSchema, sortLevels, toLevel, type Level } from './level.js';

/**
 * A level file that was skipped
 */
export interface LevelLoadIssue {
  /** File name (or record label for in-memory records) */
  file: string;
  error: TrainerError;
}

/**
 * Result of loading levels
 */
export interface LoadLevelsResult {
  /** Accepted levels, ordered by ordinal */
  levels: readonly Level[];
  issues: readonly LevelLoadIssue[];
}

/**
 * Loader options
 */
export interface LoadLevelsOptions {
  logger?: Logger;
}

interface NamedRecord {
  name: string;
  data: unknown;
}

function collect(records: readonly NamedRecord[], logger: Logger): LoadLevelsResult {
  const levels: Level[] = [];
  const issues: LevelLoadIssue[] = [];
  const seen = new Map<number, string>();

  const reject = (file: string, error: TrainerError): void => {
    issues.push({ file, error });
    logger.warn(`Skipping level ${file}: ${error.message}`, { code: error.code });
  };

  for (const record of records) {
    const parsed = levelFileSchema.safeParse(record.data);
    if (!parsed.success) {
      reject(
        record.name,
        new TrainerError({
          code: 'TRAINER_L101',
          message: `Invalid level file ${record.name}: ${formatSchemaIssues(parsed.error)}`,
          context: { file: record.name },
        })
      );
      continue;
    }

    const level = toLevel(parsed.data);
    const firstOwner = seen.get(level.ordinal);
    if (firstOwner !== undefined) {
      reject(
        record.name,
        new TrainerError({
          code: 'TRAINER_L102',
          message: `Level number ${level.ordinal} in ${record.name} is already used by ${firstOwner}`,
          context: { file: record.name, ordinal: level.ordinal, usedBy: firstOwner },
        })
      );
      continue;
    }

    seen.set(level.ordinal, record.name);
    levels.push(level);
  }

  return { levels: sortLevels(levels), issues };
}

/**
 * Load every `*.json` level file in a directory.
 *
 * @param directory - Directory holding one JSON file per level
 * @throws TrainerError `TRAINER_L100` when the directory cannot be listed
 */
export function loadLevels(directory: string, options: LoadLevelsOptions = {}): LoadLevelsResult {
  const logger = options.logger ?? noopLogger;

  let fileNames: string[];
  try {
    fileNames = fs
      .readdirSync(directory)
      .filter((name) => name.toLowerCase().endsWith('.json'))
      .sort();
  } catch (error) {
    throw new TrainerError({
      code: 'TRAINER_L100',
      message: `Levels directory could not be read: ${directory}`,
      context: { directory },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const records: NamedRecord[] = [];
  const unreadable: LevelLoadIssue[] = [];

  for (const name of fileNames) {
    const filePath = path.join(directory, name);
    try {
      records.push({ name, data: JSON.parse(fs.readFileSync(filePath, 'utf-8')) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const issue: LevelLoadIssue = {
        file: name,
        error: new TrainerError({
          code: 'TRAINER_L101',
          message: `Error reading level file ${name}: ${reason}`,
          context: { file: name },
          cause: error instanceof Error ? error : undefined,
        }),
      };
      unreadable.push(issue);
      logger.warn(`Skipping level ${name}: ${reason}`, { code: issue.error.code });
    }
  }

  const result = collect(records, logger);
  logger.debug('Levels loaded', { directory, count: result.levels.length });

  return { levels: result.levels, issues: [...unreadable, ...result.issues] };
}

/**
 * Validate and order in-memory level records.
 */
export function loadLevelsFromRecords(
  records: readonly unknown[],
  options: LoadLevelsOptions = {}
): LoadLevelsResult {
  return collect(
    records.map((data, index) => ({ name: `record[${index}]`, data })),
    options.logger ?? noopLogger
  );
}
