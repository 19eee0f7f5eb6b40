/**
 * Interactive prompts.
 *
 * The core only sees the Prompter interface. The CLI supplies a readline
 * implementation; tests supply scripted answers.
 */

import type { Reporter } from './output.js';

export interface Prompter {
  /** Ask a question and read one line. Resolves null when input is closed. */
  ask(question: string): Promise<string | null>;
}

/**
 * Ask a yes/no question until the answer is recognizable.
 * Closed input counts as "no".
 */
export async function confirm(
  prompter: Prompter,
  reporter: Reporter,
  question: string,
): Promise<boolean> {
  for (;;) {
    const answer = await prompter.ask(`${question} [y/n]: `);
    if (answer === null) return false;
    const normalized = answer.trim().toLowerCase();
    if (normalized === 'y' || normalized === 'yes') return true;
    if (normalized === 'n' || normalized === 'no') return false;
    reporter.print('Please answer yes or no.');
  }
}
