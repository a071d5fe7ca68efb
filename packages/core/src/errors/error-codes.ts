/**
 * Trainer Error Codes
 *
 * Error codes are structured as TRAINER_[CATEGORY][NUMBER]:
 * - L: Level errors (L100-L199)
 * - S: Session errors (S200-S299)
 * - R: Runner errors (R300-R399)
 * - C: Configuration errors (C400-C499)
 * - A: Attempt log errors (A500-A599)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Level errors (L100-L199)
  TRAINER_L100: {
    code: 'TRAINER_L100',
    message: 'Levels directory could not be read',
    suggestion: 'Check that the levels directory exists, or pass --levels <dir>.',
  },
  TRAINER_L101: {
    code: 'TRAINER_L101',
    message: 'Invalid level file',
    suggestion:
      'Each level file must be JSON with a numeric "number" and a non-empty "expected_command".',
  },
  TRAINER_L102: {
    code: 'TRAINER_L102',
    message: 'Duplicate level number',
    suggestion: 'Give every level file a unique "number".',
  },

  // Session errors (S200-S299)
  TRAINER_S200: {
    code: 'TRAINER_S200',
    message: 'No levels to train on',
    suggestion: 'Add at least one level file to the levels directory.',
  },
  TRAINER_S201: {
    code: 'TRAINER_S201',
    message: 'Unknown start level',
    suggestion: 'Run "shell-trainer levels" to see the available level numbers.',
  },
  TRAINER_S202: {
    code: 'TRAINER_S202',
    message: 'Session already finished',
    suggestion: 'Start a new session to keep practising.',
  },

  // Runner errors (R300-R399)
  TRAINER_R300: {
    code: 'TRAINER_R300',
    message: 'Command could not be executed',
    suggestion: 'Shell builtins such as "history" cannot be run outside a shell.',
  },

  // Configuration errors (C400-C499)
  TRAINER_C400: {
    code: 'TRAINER_C400',
    message: 'Invalid configuration',
    suggestion: 'Fix the reported fields in shell-trainer.config.json.',
  },

  // Attempt log errors (A500-A599)
  TRAINER_A500: {
    code: 'TRAINER_A500',
    message: 'Attempt log could not be written',
    suggestion: 'Pass --log <file> with a writable file path.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'level' | 'session' | 'runner' | 'config' | 'log';

const CATEGORY_OFFSET = 'TRAINER_'.length;

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(CATEGORY_OFFSET);
  switch (letter) {
    case 'L':
      return 'level';
    case 'S':
      return 'session';
    case 'R':
      return 'runner';
    case 'A':
      return 'log';
    default:
      return 'config';
  }
}
