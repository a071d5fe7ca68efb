/**
 * ANSI styling for learner-facing output.
 *
 * @module @shell-trainer/cli/terminal
 */

const CODES = {
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

const RESET = '\x1b[0m';

export type StyleName = keyof typeof CODES;

export type Style = Record<StyleName, (text: string) => string>;

/**
 * Create styling helpers. With `enabled` false every helper returns its
 * input unchanged.
 */
export function createStyle(enabled: boolean): Style {
  const wrap =
    (code: string) =>
    (text: string): string =>
      enabled ? `${code}${text}${RESET}` : text;

  return {
    bold: wrap(CODES.bold),
    dim: wrap(CODES.dim),
    red: wrap(CODES.red),
    green: wrap(CODES.green),
    yellow: wrap(CODES.yellow),
    cyan: wrap(CODES.cyan),
  };
}
