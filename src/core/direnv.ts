/**
 * direnv integration: .envrc activates the environment, .env holds
 * project secrets (mode 600).
 */

import { existsSync } from 'node:fs';
import { readFile, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { atomicWrite } from '../store/atomic.js';
import type { EnvironmentLocation } from './backend/index.js';
import type { Reporter } from './output.js';
import { PyveError } from './errors.js';
import { DIRENV_FILE_NAME, ENV_FILE_NAME } from './paths.js';

/** .envrc contents for an environment. Paths are relative to the project. */
export function renderEnvrc(location: EnvironmentLocation): string {
  const dir = `$PWD/${location.relativePath}`;
  const lines =
    location.backend === 'venv'
      ? [`export VIRTUAL_ENV="${dir}"`, `export PATH="${dir}/bin:$PATH"`]
      : [`export CONDA_PREFIX="${dir}"`, `export PATH="${dir}/bin:$PATH"`];
  lines.push('dotenv_if_exists');
  return `${lines.join('\n')}\n`;
}

/** Write .envrc unless one exists. */
export async function writeEnvrc(root: string, location: EnvironmentLocation, reporter: Reporter): Promise<boolean> {
  const path = join(root, DIRENV_FILE_NAME);
  if (existsSync(path)) {
    reporter.info(`direnv already configured (found ${DIRENV_FILE_NAME}). No change.`);
    return false;
  }
  await atomicWrite(path, renderEnvrc(location));
  reporter.success(`Created ${DIRENV_FILE_NAME}. Run 'direnv allow' to activate the environment.`);
  return true;
}

/** Create an empty .env with owner-only permissions unless one exists. */
export async function ensureDotEnv(root: string): Promise<boolean> {
  const path = join(root, ENV_FILE_NAME);
  if (existsSync(path)) return false;
  await atomicWrite(path, '', { mode: 0o600 });
  return true;
}

/**
 * Remove .envrc, and .env only when it is empty.
 * A non-empty .env is kept with a warning.
 */
export async function removeDirenvFiles(root: string, reporter: Reporter): Promise<void> {
  const envrc = join(root, DIRENV_FILE_NAME);
  const dotenv = join(root, ENV_FILE_NAME);
  try {
    await rm(envrc, { force: true });
    if (existsSync(dotenv)) {
      const info = await stat(dotenv);
      const content = info.size > 0 ? await readFile(dotenv, 'utf8') : '';
      if (content.trim() === '') {
        await rm(dotenv, { force: true });
      } else {
        reporter.warn(`${ENV_FILE_NAME} contains data and was kept`);
      }
    }
  } catch (err) {
    throw new PyveError('FILE_ERROR', 'Failed to remove direnv files', { cause: err });
  }
}
