/**
 * Environment removal.
 *
 * .pyve/testenv is never touched: the test-runner environment survives
 * both purge and force re-initialization.
 */

import { existsSync } from 'node:fs';
import { readdir, rm, rmdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ProjectConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import type { ProjectContext } from './context.js';
import { locateEnvironment, removeEnvironment } from './backend/index.js';
import { removeDirenvFiles } from './direnv.js';
import { PyveError } from './errors.js';
import { removeGitignorePatterns } from './gitignore.js';
import { getLogger } from './logger.js';
import { DIRENV_FILE_NAME, ENV_FILE_NAME, getEnvsDir, getPyveDir } from './paths.js';
import { confirm } from './prompt.js';
import { deleteProjectConfig, inspectProject } from './project/config.js';

async function removeDir(path: string, label: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err) {
    throw new PyveError('FILE_ERROR', `Failed to remove ${label}`, { cause: err });
  }
}

/**
 * Remove a project's environment.
 * With no readable config, removes the default venv directory and every
 * micromamba prefix under .pyve/envs.
 * Returns the removed paths, relative to the project root.
 */
export async function removeProjectEnvironment(
  ctx: ProjectContext,
  config: ProjectConfig | undefined,
): Promise<string[]> {
  const { root, settings } = ctx;
  if (config) {
    const location = await locateEnvironment(root, config, settings);
    if (!existsSync(location.path)) return [];
    await removeEnvironment(location);
    return [location.relativePath];
  }

  const removed: string[] = [];
  const venvDir = settings.defaults.venvDirectory;
  if (existsSync(join(root, venvDir))) {
    await removeDir(join(root, venvDir), venvDir);
    removed.push(venvDir);
  }
  if (existsSync(getEnvsDir(root))) {
    await removeDir(getEnvsDir(root), '.pyve/envs');
    removed.push('.pyve/envs');
  }
  return removed;
}

/** Drop .pyve when nothing (e.g. testenv) is left in it. */
async function removePyveDirIfEmpty(root: string): Promise<void> {
  const dir = getPyveDir(root);
  if (!existsSync(dir)) return;
  const entries = await readdir(dir);
  if (entries.length === 0) await rmdir(dir);
}

export interface PurgeOptions {
  /** Venv directory to purge when no config names one. */
  venvDirectory?: string;
}

/**
 * Remove the environment, direnv files, gitignore patterns and finally the
 * project config.
 */
export async function purgeProject(ctx: ProjectContext, options: PurgeOptions = {}): Promise<ExitCode> {
  const log = getLogger('purge');
  const { root, reporter, settings } = ctx;
  const state = await inspectProject(root);

  let config: ProjectConfig | undefined;
  if (state.kind === 'configured') {
    config = state.config;
  } else if (options.venvDirectory !== undefined) {
    config = { backend: 'venv', venvDirectory: options.venvDirectory };
  }

  const defaultVenv = join(root, settings.defaults.venvDirectory);
  if (state.kind === 'none' && config === undefined && !existsSync(defaultVenv) && !existsSync(getEnvsDir(root))) {
    reporter.info('Pyve is not initialized in this project. Nothing to purge.');
    return ExitCode.SUCCESS;
  }

  if (!settings.behavior.autoYes) {
    const approved = await confirm(ctx.prompter, reporter, `Purge the Pyve environment in ${root}?`);
    if (!approved) {
      reporter.print('Purge cancelled.');
      return ExitCode.SUCCESS;
    }
  }

  reporter.print('Purging Pyve environment...');
  const removed = await removeProjectEnvironment(ctx, config);
  for (const path of removed) reporter.success(`Removed ${path}`);

  await removeDirenvFiles(root, reporter);

  const patterns = [...removed, DIRENV_FILE_NAME];
  if (!existsSync(join(root, ENV_FILE_NAME))) patterns.push(ENV_FILE_NAME);
  await removeGitignorePatterns(root, patterns);

  await removeDir(getEnvsDir(root), '.pyve/envs');
  await deleteProjectConfig(root);
  await removePyveDirIfEmpty(root);

  log.info({ root, removed }, 'purged');
  reporter.success('Pyve environment purged');
  return ExitCode.SUCCESS;
}
