/**
 * Where a project's environment lives, per backend.
 */

import { rm } from 'node:fs/promises';
import { join, relative } from 'node:path';
import type { Backend, ProjectConfig, PyveSettings } from '../../types/config.js';
import { PyveError } from '../errors.js';
import { getMicromambaPrefix } from '../paths.js';
import { resolveEnvironmentName } from './env-name.js';

export interface EnvironmentLocation {
  backend: Backend;
  /** Absolute path of the venv directory or micromamba prefix. */
  path: string;
  /** Path relative to the project root, as shown to the user. */
  relativePath: string;
  /** Micromamba environment name. */
  name?: string;
}

/** Locate the environment a config describes. */
export async function locateEnvironment(
  root: string,
  config: Pick<ProjectConfig, 'backend' | 'venvDirectory' | 'environmentName'>,
  settings: PyveSettings,
): Promise<EnvironmentLocation> {
  if (config.backend === 'venv') {
    const directory = config.venvDirectory ?? settings.defaults.venvDirectory;
    return { backend: 'venv', path: join(root, directory), relativePath: directory };
  }
  const name = await resolveEnvironmentName(root, undefined, config.environmentName);
  const path = getMicromambaPrefix(root, name);
  return { backend: 'micromamba', path, relativePath: relative(root, path), name };
}

/** Delete an environment directory. Missing is not an error. */
export async function removeEnvironment(location: EnvironmentLocation): Promise<void> {
  try {
    await rm(location.path, { recursive: true, force: true });
  } catch (err) {
    throw new PyveError('FILE_ERROR', `Failed to remove environment: ${location.relativePath}`, { cause: err });
  }
}

export { createVenv, validateVenvDirectoryName } from './venv.js';
export { createMicromambaEnv, findMicromamba, getMicromambaVersion, requireMicromamba } from './micromamba.js';
export { detectBackendFromFiles, parseBackendOption, resolveBackend } from './detect.js';
export { resolveEnvironmentName, sanitizeEnvironmentName, validateEnvironmentName } from './env-name.js';
export { detectEnvironmentFile, requireEnvironmentFile, checkLockFileStatus } from './environment-file.js';
