import * as fs from 'node:fs';
import * as path from 'node:path';
import type { OutputSink, Prompter } from '../terminal/io.js';

export interface ScriptedPrompter extends Prompter {
  readonly prompts: string[];
  closed: boolean;
}

/**
 * Prompter that answers with the given lines, then reports end of input.
 */
export function createScriptedPrompter(lines: readonly string[]): ScriptedPrompter {
  const queue = [...lines];
  const prompter: ScriptedPrompter = {
    prompts: [],
    closed: false,
    ask(prompt: string): Promise<string | null> {
      prompter.prompts.push(prompt);
      return Promise.resolve(queue.shift() ?? null);
    },
    close(): void {
      prompter.closed = true;
    },
  };
  return prompter;
}

export interface CapturedOutput extends OutputSink {
  readonly chunks: string[];
  lines(): string[];
}

export function createCapturedOutput(): CapturedOutput {
  const chunks: string[] = [];
  return {
    chunks,
    write(text: string): void {
      chunks.push(text);
    },
    lines(): string[] {
      return chunks.join('').split('\n');
    },
  };
}

export function writeLevel(dir: string, name: string, data: unknown): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, name), JSON.stringify(data), 'utf-8');
}
