/**
 * Process exit codes.
 *
 * Init, purge and run only ever finish with SUCCESS or FAILURE (run passes
 * its child's code through). WARNINGS is reserved for validation reports.
 */

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  WARNINGS = 2,

  /** Command could not be spawned (same value a POSIX shell uses). */
  COMMAND_NOT_FOUND = 127,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: number): string {
  switch (code) {
    case ExitCode.SUCCESS: return 'SUCCESS';
    case ExitCode.FAILURE: return 'FAILURE';
    case ExitCode.WARNINGS: return 'WARNINGS';
    case ExitCode.COMMAND_NOT_FOUND: return 'COMMAND_NOT_FOUND';
    default: return `EXIT_${code}`;
  }
}
