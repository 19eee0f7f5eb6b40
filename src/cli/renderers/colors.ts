/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when the stream is not a terminal.
 */

/** Whether ANSI color escape codes should be used. */
export function shouldUseColor(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true,
): boolean {
  if (env['NO_COLOR'] !== undefined) return false;
  if (env['FORCE_COLOR'] !== undefined) return true;
  return isTTY;
}

export interface Palette {
  BOLD: string;
  NC: string;
  RED: string;
  GREEN: string;
  YELLOW: string;
}

const ANSI: Palette = {
  BOLD: '\x1b[1m',
  NC: '\x1b[0m',
  RED: '\x1b[0;31m',
  GREEN: '\x1b[0;32m',
  YELLOW: '\x1b[1;33m',
};

const PLAIN: Palette = { BOLD: '', NC: '', RED: '', GREEN: '', YELLOW: '' };

export function getPalette(color: boolean): Palette {
  return color ? ANSI : PLAIN;
}

// ---------------------------------------------------------------------------
// Status symbols
// ---------------------------------------------------------------------------

export type Severity = 'pass' | 'warn' | 'fail';

export const SEVERITY_SYMBOLS: Record<Severity, string> = {
  pass: '✓',
  warn: '⚠',
  fail: '✗',
};

/** Colored status symbol. */
export function severitySymbol(severity: Severity, palette: Palette): string {
  const color = severity === 'pass' ? palette.GREEN : severity === 'warn' ? palette.YELLOW : palette.RED;
  return `${color}${SEVERITY_SYMBOLS[severity]}${palette.NC}`;
}
