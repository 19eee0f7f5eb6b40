/**
 * Per-invocation wiring between commander actions and the core.
 */

import type { ProjectContext } from '../core/context.js';
import type { CommandRunner } from '../core/exec.js';
import { createConsoleReporter, type Reporter } from '../core/output.js';
import { getPyveHome, resolveProjectRoot } from '../core/paths.js';
import type { Prompter } from '../core/prompt.js';
import { loadSettings } from '../core/settings.js';
import type { PyveSettings } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';

/** Process-level dependencies; tests substitute fakes. */
export interface CliServices {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  runner: CommandRunner;
  prompter: Prompter;
  toolVersion: string;
  /** Emit ANSI colors in rendered reports. */
  color: boolean;
  /** Already resolved settings; loaded from `env` when absent. */
  settings?: PyveSettings;
}

export class CliRuntime {
  /** Exit code of the action that ran. */
  exitCode: number = ExitCode.SUCCESS;
  readonly reporter: Reporter;
  private settings: PyveSettings | null;

  constructor(readonly services: CliServices) {
    this.reporter = createConsoleReporter(services.stdout, services.stderr);
    this.settings = services.settings ?? null;
  }

  /** Write a block of text to stdout. */
  write(text: string): void {
    this.services.stdout.write(`${text}\n`);
  }

  writeJson(data: unknown): void {
    this.write(JSON.stringify(data, null, 2));
  }

  async loadSettings(): Promise<PyveSettings> {
    this.settings ??= await loadSettings(this.services.env);
    return this.settings;
  }

  /** Context for the project in the working directory. */
  async context(): Promise<ProjectContext> {
    const { services } = this;
    return {
      root: resolveProjectRoot(undefined, services.cwd),
      home: getPyveHome(services.env),
      toolVersion: services.toolVersion,
      settings: await this.loadSettings(),
      runner: services.runner,
      reporter: this.reporter,
      prompter: services.prompter,
    };
  }
}
