/**
 * Reserved test-runner environment (pyve test).
 *
 * Lives at .pyve/testenv/venv, apart from the project environment, so
 * dev tools stay out of the project's dependencies.
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { relative } from 'node:path';
import type { ProjectContext } from './context.js';
import { PyveError } from './errors.js';
import { getLogger } from './logger.js';
import { getTestEnvDir, getTestEnvVenvPath } from './paths.js';
import { venvPython } from './platform.js';
import { confirm } from './prompt.js';
import { venvProcessEnv } from './run.js';

/** Create the test environment when missing. Returns its absolute path. */
export async function ensureTestEnv(ctx: ProjectContext): Promise<string> {
  const { root, runner, reporter, settings } = ctx;
  const venvPath = getTestEnvVenvPath(root);
  if (existsSync(venvPath)) return venvPath;

  const python = settings.tools.python;
  if (!(await runner.exists(python))) {
    throw new PyveError('TOOL_NOT_FOUND', `Python interpreter not found: ${python}`, {
      fix: 'Install Python or set PYVE_PYTHON to an interpreter path',
    });
  }

  await mkdir(getTestEnvDir(root), { recursive: true });
  const result = await runner.run(python, ['-m', 'venv', venvPath], { cwd: root });
  if (result.code !== 0) {
    throw new PyveError('COMMAND_FAILED', `Failed to create test environment: ${result.stderr.trim()}`);
  }
  reporter.success(`Created test environment in ${relative(root, venvPath)}`);
  return venvPath;
}

/**
 * Make sure pytest is importable in the test environment. Installs it
 * without asking under auto-yes or CI.
 */
export async function ensurePytest(ctx: ProjectContext, venvPath: string): Promise<void> {
  const { runner, reporter, settings } = ctx;
  const python = venvPython(venvPath);

  const probe = await runner.run(python, ['-c', 'import pytest'], { cwd: ctx.root });
  if (probe.code === 0) return;

  const automatic = settings.behavior.autoYes || settings.behavior.ci;
  if (!automatic && !(await confirm(ctx.prompter, reporter, 'pytest is not installed in the test environment. Install it now?'))) {
    throw new PyveError('INVALID_INPUT', 'pytest is required to run tests', {
      fix: `Install it with: ${python} -m pip install pytest`,
    });
  }

  reporter.info('Installing pytest into the test environment...');
  const install = await runner.run(python, ['-m', 'pip', 'install', 'pytest'], { cwd: ctx.root });
  if (install.code !== 0) {
    throw new PyveError('COMMAND_FAILED', `Failed to install pytest: ${install.stderr.trim()}`);
  }
  reporter.success('pytest installed');
}

/** Run pytest from the test environment; resolves with its exit code. */
export async function runTests(
  ctx: ProjectContext,
  args: string[],
  baseEnv: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const log = getLogger('testenv');
  const venvPath = await ensureTestEnv(ctx);
  await ensurePytest(ctx, venvPath);
  log.debug({ venvPath, args }, 'running pytest');
  return ctx.runner.launch(venvPython(venvPath), ['-m', 'pytest', ...args], {
    cwd: ctx.root,
    env: venvProcessEnv(venvPath, baseEnv),
  });
}
