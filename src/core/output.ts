/**
 * User-facing output.
 *
 * Core operations never write to the console directly; they report through
 * a Reporter so the CLI decides where lines go and tests can record them.
 * info/success/print lines go to stdout, warnings and errors to stderr.
 */

import { PyveError } from './errors.js';

export interface Reporter {
  /** Plain line on stdout. */
  print(line: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatInfo(message: string): string {
  return `INFO: ${message}`;
}

export function formatSuccess(message: string): string {
  return `✓ ${message}`;
}

export function formatWarning(message: string): string {
  return `WARNING: ${message}`;
}

export function formatErrorLine(message: string): string {
  return `ERROR: ${message}`;
}

/** Reporter writing to the given streams. */
export function createConsoleReporter(
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr,
): Reporter {
  return {
    print: (line) => { stdout.write(`${line}\n`); },
    info: (message) => { stdout.write(`${formatInfo(message)}\n`); },
    success: (message) => { stdout.write(`${formatSuccess(message)}\n`); },
    warn: (message) => { stderr.write(`${formatWarning(message)}\n`); },
    error: (message) => { stderr.write(`${formatErrorLine(message)}\n`); },
  };
}

/**
 * Format an error for stderr. PyveErrors render their message and fix hint;
 * anything else renders its message only.
 */
export function formatError(error: unknown): string[] {
  if (error instanceof PyveError) {
    const lines = [formatErrorLine(error.message)];
    if (error.fix) lines.push(`Fix: ${error.fix}`);
    return lines;
  }
  const message = error instanceof Error ? error.message : String(error);
  return [formatErrorLine(message)];
}
