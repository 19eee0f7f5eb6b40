/**
 * Python venv backend.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ProjectContext } from '../context.js';
import { PyveError } from '../errors.js';
import { getLogger } from '../logger.js';
import { venvPython } from '../platform.js';

const RESERVED_DIRECTORY_NAMES = ['.env', '.git', '.gitignore', '.tool-versions', '.python-version', '.envrc'];

/** Throws INVALID_INPUT for a directory name venv cannot use. */
export function validateVenvDirectoryName(name: string): void {
  if (!name) {
    throw new PyveError('INVALID_INPUT', 'Virtual environment directory name cannot be empty.');
  }
  if (!/^[a-zA-Z0-9._-]+$/.test(name)) {
    throw new PyveError(
      'INVALID_INPUT',
      `Invalid directory name '${name}'. Use only alphanumeric characters, dots, underscores, and hyphens.`,
    );
  }
  if (RESERVED_DIRECTORY_NAMES.includes(name)) {
    throw new PyveError('INVALID_INPUT', `Directory name '${name}' is reserved and cannot be used.`);
  }
}

/**
 * Create a virtual environment at `directory` (relative to the project
 * root) and install requirements.txt into it when present.
 * An existing directory is left alone.
 */
export async function createVenv(ctx: ProjectContext, directory: string): Promise<'created' | 'exists'> {
  const log = getLogger('backend');
  const { root, runner, reporter, settings } = ctx;
  const venvPath = join(root, directory);

  if (existsSync(venvPath)) {
    reporter.info(`Python virtual environment is already set up (found ${directory}). No change.`);
    return 'exists';
  }

  const python = settings.tools.python;
  if (!(await runner.exists(python))) {
    throw new PyveError('TOOL_NOT_FOUND', `Python interpreter not found: ${python}`, {
      fix: 'Install Python or set PYVE_PYTHON to an interpreter path',
    });
  }

  log.info({ venvPath, python }, 'creating venv');
  const result = await runner.run(python, ['-m', 'venv', venvPath], { cwd: root });
  if (result.code !== 0) {
    throw new PyveError('COMMAND_FAILED', `Failed to create virtual environment in '${directory}': ${result.stderr.trim()}`);
  }
  reporter.success(`Created Python virtual environment in '${directory}'`);

  if (existsSync(join(root, 'requirements.txt'))) {
    reporter.info('Installing dependencies from requirements.txt...');
    const pip = await runner.run(venvPython(venvPath), ['-m', 'pip', 'install', '-r', 'requirements.txt'], { cwd: root });
    if (pip.code !== 0) {
      throw new PyveError('COMMAND_FAILED', `pip install failed: ${pip.stderr.trim()}`, {
        fix: `Fix requirements.txt, then run 'pyve --init --force'`,
      });
    }
    reporter.success('Dependencies installed');
  }

  return 'created';
}
