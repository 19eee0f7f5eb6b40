/**
 * pyve --init [directory]: fresh initialization or re-initialization.
 */

import { parseBackendOption } from '../../core/backend/index.js';
import { PyveError } from '../../core/errors.js';
import { reconcileInit } from '../../core/reinit/reconcile.js';
import type { InitMode, InitRequest } from '../../core/reinit/decide.js';
import type { CliRuntime } from '../runtime.js';

export interface InitFlags {
  /** true for a bare --init, the venv directory name otherwise. */
  init: string | true;
  update?: boolean;
  force?: boolean;
  backend?: string;
  pythonVersion?: string;
  envName?: string;
  direnv: boolean;
}

function initMode(flags: InitFlags): InitMode {
  if (flags.update && flags.force) {
    throw new PyveError('INVALID_INPUT', '--update and --force cannot be used together', {
      fix: "Use '--update' to keep the environment or '--force' to rebuild it",
    });
  }
  if (flags.update) return 'update';
  if (flags.force) return 'force';
  return 'none';
}

/** Translate CLI flags into an init request. */
export function buildInitRequest(flags: InitFlags): InitRequest {
  return {
    mode: initMode(flags),
    backend: parseBackendOption(flags.backend),
    venvDirectory: typeof flags.init === 'string' ? flags.init : undefined,
    pythonVersion: flags.pythonVersion,
    environmentName: flags.envName,
    direnv: flags.direnv,
  };
}

export async function initAction(runtime: CliRuntime, flags: InitFlags): Promise<void> {
  const request = buildInitRequest(flags);
  runtime.exitCode = await reconcileInit(await runtime.context(), request);
}
