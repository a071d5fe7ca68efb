/**
 * Line input and text output for the interactive trainer.
 *
 * @module @shell-trainer/cli/terminal
 */

import * as readline from 'node:readline';

/**
 * Reads one line at a time
 */
export interface Prompter {
  /** Show `prompt` and resolve with the next line, or null at end of input */
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * Receives learner-facing text
 */
export interface OutputSink {
  write(text: string): void;
}

/**
 * Prompter over a readable stream (stdin by default).
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(prompt: string): Promise<string | null> {
      rl.setPrompt(prompt);
      rl.prompt();
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close(): void {
      rl.close();
    },
  };
}

/**
 * Print a line to an output sink.
 */
export function println(output: OutputSink, text = ''): void {
  output.write(`${text}\n`);
}
