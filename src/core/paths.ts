/**
 * Path resolution.
 *
 * Environment variables:
 *   PYVE_HOME   - Global directory for settings and logs (default: ~/.pyve)
 *
 * Project layout, relative to the project root:
 *   .pyve/config          project record
 *   .pyve/envs/<name>     micromamba environments
 *   .pyve/testenv/venv    reserved test-runner environment (survives purge)
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export const PYVE_DIR_NAME = '.pyve';
export const CONFIG_FILE_NAME = 'config';
export const ENV_FILE_NAME = '.env';
export const DIRENV_FILE_NAME = '.envrc';
export const GITIGNORE_FILE_NAME = '.gitignore';

/**
 * Get the global pyve home directory.
 * Respects PYVE_HOME, defaults to ~/.pyve.
 */
export function getPyveHome(env: NodeJS.ProcessEnv = process.env): string {
  return env['PYVE_HOME'] ?? join(homedir(), '.pyve');
}

/** Global settings file. */
export function getGlobalSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getPyveHome(env), 'settings.json');
}

/** Absolute project root for an optional directory argument. */
export function resolveProjectRoot(dir?: string, cwd: string = process.cwd()): string {
  return resolve(cwd, dir ?? '.');
}

export function getPyveDir(root: string): string {
  return join(root, PYVE_DIR_NAME);
}

export function getConfigPath(root: string): string {
  return join(root, PYVE_DIR_NAME, CONFIG_FILE_NAME);
}

export function getEnvsDir(root: string): string {
  return join(root, PYVE_DIR_NAME, 'envs');
}

/** Prefix of a project-local micromamba environment. */
export function getMicromambaPrefix(root: string, envName: string): string {
  return join(getEnvsDir(root), envName);
}

/** Parent of the reserved test-runner environment. */
export function getTestEnvDir(root: string): string {
  return join(root, PYVE_DIR_NAME, 'testenv');
}

export function getTestEnvVenvPath(root: string): string {
  return join(getTestEnvDir(root), 'venv');
}
