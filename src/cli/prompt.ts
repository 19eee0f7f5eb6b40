/**
 * Line-based prompter over stdin.
 *
 * One readline interface serves every question of an invocation, so
 * answers piped in ahead of time ("1\ny\n") are consumed in order.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Prompter } from '../core/prompt.js';

export interface ClosablePrompter extends Prompter {
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ClosablePrompter {
  let rl: Interface | null = null;
  let closed = false;
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];

  function open(): void {
    if (rl) return;
    rl = createInterface({ input, terminal: false });
    rl.on('line', (line) => {
      const next = waiting.shift();
      if (next) next(line);
      else buffered.push(line);
    });
    rl.on('close', () => {
      closed = true;
      for (const resolve of waiting.splice(0)) resolve(null);
    });
  }

  return {
    ask(question) {
      output.write(question);
      open();
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close() {
      rl?.close();
    },
  };
}
