/**
 * Pyve error type.
 *
 * Every failure the user can act on is a PyveError: it carries a kind for
 * programmatic matching, the exit code the process should end with and an
 * optional fix hint printed under the message.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

export type PyveErrorKind =
  | 'CONFIG_MISSING'
  | 'CONFIG_CORRUPT'
  | 'BACKEND_CONFLICT'
  | 'INVALID_CHOICE'
  | 'MISSING_ENVIRONMENT'
  | 'MISSING_MANIFEST'
  | 'NOT_INITIALIZED'
  | 'INVALID_INPUT'
  | 'TOOL_NOT_FOUND'
  | 'COMMAND_FAILED'
  | 'FILE_ERROR';

export class PyveError extends Error {
  readonly kind: PyveErrorKind;
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    kind: PyveErrorKind,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
      code?: ExitCode;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'PyveError';
    this.kind = kind;
    this.code = options?.code ?? ExitCode.FAILURE;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for --json output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        kind: this.kind,
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Narrow an unknown thrown value to a Node errno error. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
