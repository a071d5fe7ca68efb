/**
 * Trainer Error System
 *
 * Coded errors (TRAINER_L101, TRAINER_S202, ...) with suggestions,
 * categories and terminal formatting.
 *
 * @example
 * ```typescript
 * import { TrainerError } from '@shell-trainer/core';
 *
 * try {
 *   loadLevels('./levels');
 * } catch (error) {
 *   if (TrainerError.isCode(error, 'TRAINER_L100')) {
 *     console.error(error.formatTerminal());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  TrainerError,
  type SerializedTrainerError,
  type TrainerErrorOptions,
} from './trainer-error.js';
