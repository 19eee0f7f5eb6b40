/**
 * Local Python version pinning through asdf or pyenv.
 */

import type { ProjectContext } from './context.js';
import type { CommandRunner } from './exec.js';
import { PyveError } from './errors.js';
import { confirm } from './prompt.js';
import type { Reporter } from './output.js';

export type VersionManager = 'asdf' | 'pyenv';

/** Files each manager writes into the project. */
export const VERSION_FILE_NAMES: Record<VersionManager, string> = {
  asdf: '.tool-versions',
  pyenv: '.python-version',
};

/** Throws INVALID_INPUT unless the version is #.#.# */
export function validatePythonVersion(version: string): void {
  if (!/^\d+\.\d+\.\d+$/.test(version)) {
    throw new PyveError('INVALID_INPUT', `Invalid Python version format '${version}'. Expected format: #.#.# (e.g., 3.13.7)`);
  }
}

/**
 * asdf wins when its python plugin is installed; pyenv otherwise.
 * Returns null when neither is usable.
 */
export async function detectVersionManager(runner: CommandRunner, reporter: Reporter): Promise<VersionManager | null> {
  if (await runner.exists('asdf')) {
    const plugins = await runner.run('asdf', ['plugin', 'list']);
    if (plugins.code === 0 && plugins.stdout.split('\n').some((l) => l.trim() === 'python')) {
      return 'asdf';
    }
    reporter.warn('asdf found but Python plugin not installed.');
    reporter.warn('Install with: asdf plugin add python');
  }
  if (await runner.exists('pyenv')) return 'pyenv';
  return null;
}

async function isInstalled(runner: CommandRunner, manager: VersionManager, version: string): Promise<boolean> {
  if (manager === 'asdf') {
    const result = await runner.run('asdf', ['list', 'python']);
    return result.code === 0 && result.stdout.split('\n').some((l) => l.replace('*', '').trim() === version);
  }
  const result = await runner.run('pyenv', ['versions', '--bare']);
  return result.code === 0 && result.stdout.split('\n').some((l) => l.trim() === version);
}

async function install(runner: CommandRunner, manager: VersionManager, version: string): Promise<void> {
  const args = manager === 'asdf' ? ['install', 'python', version] : ['install', '-s', version];
  const result = await runner.run(manager, args);
  if (result.code !== 0) {
    throw new PyveError('COMMAND_FAILED', `Failed to install Python ${version} with ${manager}: ${result.stderr.trim()}`);
  }
}

async function setLocal(runner: CommandRunner, manager: VersionManager, version: string, cwd: string): Promise<void> {
  if (manager === 'asdf') {
    let result = await runner.run('asdf', ['set', 'python', version], { cwd });
    // asdf before 0.16 only knows `local`
    if (result.code !== 0) result = await runner.run('asdf', ['local', 'python', version], { cwd });
    if (result.code !== 0) {
      throw new PyveError('COMMAND_FAILED', 'Failed to set Python version with asdf');
    }
    await runner.run('asdf', ['reshim', 'python'], { cwd });
    return;
  }
  const result = await runner.run('pyenv', ['local', version], { cwd });
  if (result.code !== 0) {
    throw new PyveError('COMMAND_FAILED', `Failed to set Python version with pyenv: ${result.stderr.trim()}`);
  }
  await runner.run('pyenv', ['rehash'], { cwd });
}

/**
 * Pin `version` for the project, installing it first if needed.
 * Installation asks for confirmation unless auto-yes is set.
 */
export async function pinPythonVersion(ctx: ProjectContext, version: string): Promise<VersionManager> {
  validatePythonVersion(version);
  const { runner, reporter, settings } = ctx;

  const manager = await detectVersionManager(runner, reporter);
  if (manager === null) {
    throw new PyveError('TOOL_NOT_FOUND', 'No Python version manager found.', {
      fix: 'Install asdf (recommended) or pyenv',
    });
  }

  if (!(await isInstalled(runner, manager, version))) {
    reporter.info(`Python ${version} is not installed but may be available via ${manager}.`);
    const approved = settings.behavior.autoYes || (await confirm(ctx.prompter, reporter, `Install Python ${version} now?`));
    if (!approved) {
      throw new PyveError('INVALID_INPUT', `Python ${version} is not installed`, {
        fix: `Install it with ${manager}, then re-run`,
      });
    }
    reporter.info(`Installing Python ${version} (this may take a few minutes)...`);
    await install(runner, manager, version);
    reporter.success(`Python ${version} installed successfully.`);
  }

  await setLocal(runner, manager, version, ctx.root);
  reporter.success(`Python ${version} set for this project (${manager})`);
  return manager;
}
