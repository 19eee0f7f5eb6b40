/**
 * Run a command inside the project environment (pyve run).
 */

import { existsSync } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { ProjectContext } from './context.js';
import { locateEnvironment, requireMicromamba } from './backend/index.js';
import { PyveError } from './errors.js';
import { getLogger } from './logger.js';
import { venvBinDir } from './platform.js';
import { inspectProject } from './project/config.js';

/**
 * Environment for a child process running inside a venv: VIRTUAL_ENV set,
 * the venv's bin directory first on PATH.
 */
export function venvProcessEnv(venvPath: string, base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const bin = venvBinDir(venvPath);
  const path = base['PATH'];
  return {
    ...base,
    VIRTUAL_ENV: venvPath,
    PATH: path ? `${bin}${delimiter}${path}` : bin,
  };
}

/**
 * Launch `command` in the project environment and resolve with its exit
 * code. A command that cannot be spawned yields 127.
 */
export async function runInEnvironment(
  ctx: ProjectContext,
  command: string,
  args: string[],
  baseEnv: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const log = getLogger('run');
  const { root, runner, settings } = ctx;

  const state = await inspectProject(root);
  if (state.kind === 'none') {
    throw new PyveError('NOT_INITIALIZED', 'Pyve is not initialized in this project.', {
      fix: "Run 'pyve --init' first",
    });
  }
  if (state.kind === 'corrupt') {
    throw new PyveError('CONFIG_CORRUPT', state.reason, { fix: "Run 'pyve --init --force' to re-initialize" });
  }

  const location = await locateEnvironment(root, state.config, settings);
  if (!existsSync(location.path)) {
    throw new PyveError('MISSING_ENVIRONMENT', `Environment not found: ${location.relativePath}`, {
      fix: "Run 'pyve --init' to create it",
    });
  }

  if (location.backend === 'venv') {
    const local = join(venvBinDir(location.path), command);
    const executable = existsSync(local) ? local : command;
    log.debug({ executable, args }, 'run in venv');
    return runner.launch(executable, args, { cwd: root, env: venvProcessEnv(location.path, baseEnv) });
  }

  const binary = await requireMicromamba(ctx);
  log.debug({ binary: binary.path, prefix: location.path, command, args }, 'run in micromamba env');
  return runner.launch(binary.path, ['run', '-p', location.path, command, ...args], { cwd: root, env: baseEnv });
}
