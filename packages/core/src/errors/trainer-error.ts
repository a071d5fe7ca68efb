/**
 * TrainerError - Coded error class with structured error information
 */

import { ERROR_CODES, type ErrorCategory, type ErrorCode, getErrorCategory } from './error-codes.js';

/**
 * Options for creating a TrainerError
 */
export interface TrainerErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a TrainerError
 */
export interface SerializedTrainerError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedTrainerError | { name: string; message: string; stack?: string };
}

/**
 * Error raised by the trainer with a stable code, a category and a
 * suggestion the CLI can print next to the message.
 *
 * @example
 * ```typescript
 * throw new TrainerError({
 *   code: 'TRAINER_S201',
 *   context: { startAt: 42 },
 * });
 *
 * try {
 *   session.submit('ls');
 * } catch (error) {
 *   if (TrainerError.isCode(error, 'TRAINER_S202')) {
 *     console.log('Session is over');
 *   }
 * }
 * ```
 */
export class TrainerError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: TrainerErrorOptions) {
    const errorInfo = ERROR_CODES[options.code];
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'TrainerError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrainerError);
    }
  }

  /**
   * Create a TrainerError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): TrainerError {
    return new TrainerError({ code, context });
  }

  /**
   * Wrap an existing error with a TrainerError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): TrainerError {
    return new TrainerError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isTrainerError(error: unknown): error is TrainerError {
    return error instanceof TrainerError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return TrainerError.isTrainerError(error) && error.code === code;
  }

  /**
   * Format the error for display (basic format)
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Format the error for terminal display using ANSI escape codes.
   */
  formatTerminal(): string {
    const red = '\x1b[31m';
    const yellow = '\x1b[33m';
    const cyan = '\x1b[36m';
    const dim = '\x1b[2m';
    const bold = '\x1b[1m';
    const reset = '\x1b[0m';

    const lines: string[] = [];

    lines.push(`${red}${bold}Error [${this.code}]${reset} ${this.message}`);

    if (Object.keys(this.context).length > 0) {
      lines.push('');
      lines.push(`${dim}Context:${reset}`);
      for (const [key, value] of Object.entries(this.context)) {
        const displayValue = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
        lines.push(`  ${cyan}${key}${reset}: ${displayValue}`);
      }
    }

    if (this.suggestion) {
      lines.push('');
      lines.push(`${yellow}${bold}Suggestion:${reset} ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedTrainerError {
    const result: SerializedTrainerError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (TrainerError.isTrainerError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}
