/**
 * Everything a core operation needs for one invocation.
 */

import type { PyveSettings } from '../types/config.js';
import type { CommandRunner } from './exec.js';
import type { Reporter } from './output.js';
import type { Prompter } from './prompt.js';

export interface ProjectContext {
  /** Absolute project root. */
  root: string;
  /** Global pyve home directory (settings, logs, user-level tools). */
  home: string;
  /** Version of the running tool, stamped into new configs. */
  toolVersion: string;
  settings: PyveSettings;
  runner: CommandRunner;
  reporter: Reporter;
  prompter: Prompter;
}
