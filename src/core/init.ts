/**
 * Fresh project initialization.
 *
 * Inputs are validated before anything touches the disk, and the project
 * config is written only after the environment exists, so a failed run
 * never leaves a config claiming success.
 */

import type { Backend, ProjectConfig } from '../types/config.js';
import type { ProjectContext } from './context.js';
import {
  checkLockFileStatus,
  createMicromambaEnv,
  createVenv,
  locateEnvironment,
  requireEnvironmentFile,
  resolveEnvironmentName,
  validateEnvironmentName,
  validateVenvDirectoryName,
  type EnvironmentLocation,
} from './backend/index.js';
import { ensureDotEnv, writeEnvrc } from './direnv.js';
import { PyveError } from './errors.js';
import { addGitignorePatterns } from './gitignore.js';
import { getLogger } from './logger.js';
import { DIRENV_FILE_NAME, ENV_FILE_NAME } from './paths.js';
import { confirm } from './prompt.js';
import { pinPythonVersion, validatePythonVersion } from './python-version.js';
import { saveProjectConfig } from './project/config.js';

export interface InitOptions {
  backend: Backend;
  venvDirectory?: string;
  pythonVersion?: string;
  environmentName?: string;
  /** Write .envrc and .env. */
  direnv: boolean;
}

export interface InitResult {
  config: ProjectConfig;
  location: EnvironmentLocation;
}

/** Warn about a stale lock file; interactive runs must confirm. */
async function checkLockFile(ctx: ProjectContext): Promise<void> {
  const status = checkLockFileStatus(ctx.root);
  const { reporter, settings } = ctx;
  if (status === 'missing') {
    reporter.info('Using environment.yml without lock file.');
    reporter.print('For reproducible builds, consider generating one: conda-lock -f environment.yml');
    return;
  }
  if (status !== 'stale') return;

  reporter.warn('Lock file may be stale (environment.yml was modified after conda-lock.yml)');
  reporter.print('Using conda-lock.yml for reproducibility.');
  if (settings.behavior.autoYes || settings.behavior.ci) return;
  if (!(await confirm(ctx.prompter, reporter, 'Continue anyway?'))) {
    throw new PyveError('INVALID_INPUT', 'Aborted. Please update lock file and try again.');
  }
}

/** Validated init inputs, ready to apply. */
export interface InitPlan {
  config: ProjectConfig;
  /** Manifest for a micromamba environment; undefined for venv. */
  environmentFile?: string;
  direnv: boolean;
}

/**
 * Check every input and build the config to write. Touches nothing on
 * disk, so callers can run it before removing anything.
 */
export async function planInit(ctx: ProjectContext, options: InitOptions): Promise<InitPlan> {
  const { root, reporter, settings } = ctx;
  const config: ProjectConfig = { version: ctx.toolVersion, backend: options.backend };

  if (options.backend === 'venv') {
    const directory = options.venvDirectory ?? settings.defaults.venvDirectory;
    validateVenvDirectoryName(directory);
    config.venvDirectory = directory;
    if (options.pythonVersion !== undefined) {
      validatePythonVersion(options.pythonVersion);
      config.pythonVersion = options.pythonVersion;
    }
    return { config, direnv: options.direnv };
  }

  const environmentFile = requireEnvironmentFile(root);
  const name = await resolveEnvironmentName(root, options.environmentName);
  validateEnvironmentName(name);
  config.environmentName = name;
  if (options.pythonVersion !== undefined) {
    reporter.warn('--python-version is ignored for micromamba; the environment file decides the Python version');
  }
  return { config, environmentFile, direnv: options.direnv };
}

/** Create the environment and project files for a checked plan. */
export async function applyInitPlan(ctx: ProjectContext, plan: InitPlan): Promise<InitResult> {
  const log = getLogger('init');
  const { root, reporter, settings } = ctx;
  const { config, environmentFile } = plan;

  reporter.info(`Initializing ${config.backend} environment in ${root}`);
  log.info({ root, backend: config.backend }, 'init');

  const location = await locateEnvironment(root, config, settings);

  if (environmentFile === undefined) {
    if (config.pythonVersion !== undefined) await pinPythonVersion(ctx, config.pythonVersion);
    await createVenv(ctx, location.relativePath);
  } else {
    await checkLockFile(ctx);
    await createMicromambaEnv(ctx, location.name ?? config.environmentName ?? '', environmentFile);
  }

  const patterns = [location.relativePath];
  if (plan.direnv) {
    await writeEnvrc(root, location, reporter);
    await ensureDotEnv(root);
    patterns.push(ENV_FILE_NAME, DIRENV_FILE_NAME);
  }
  await addGitignorePatterns(root, patterns);

  await saveProjectConfig(root, config);
  reporter.success(`Pyve initialized (backend: ${config.backend}, version ${ctx.toolVersion})`);
  return { config, location };
}

export async function initializeProject(ctx: ProjectContext, options: InitOptions): Promise<InitResult> {
  return applyInitPlan(ctx, await planInit(ctx, options));
}
