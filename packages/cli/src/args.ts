/**
 * @shell-trainer/cli - Argument Parsing
 *
 * @module @shell-trainer/cli
 */

/**
 * Flags that never take a value, so `--no-run train` keeps `train` as the command
 */
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  'help',
  'h',
  'version',
  'v',
  'no-run',
  'no-color',
  'verbose',
  'quiet',
]);

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg.startsWith('-') && arg !== '-') {
      const key = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
      const nextArg = args[i + 1];

      if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith('-')) {
        flags[key] = nextArg;
        i++;
      } else {
        flags[key] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

/**
 * Read a string flag, accepting any of its aliases
 *
 * @throws Error when the flag is present without a value
 */
export function stringFlag(parsed: ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = parsed.flags[name];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new Error(`--${name} expects a value`);
    }
    return value;
  }
  return undefined;
}

/**
 * Read an integer flag
 *
 * @throws Error when the flag is present but not an integer
 */
export function integerFlag(parsed: ParsedArgs, name: string): number | undefined {
  const value = parsed.flags[name];
  if (value === undefined) return undefined;

  const parsedValue = typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsedValue)) {
    throw new Error(`--${name} expects a whole number`);
  }
  return parsedValue;
}
