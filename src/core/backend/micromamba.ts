/**
 * Micromamba backend.
 *
 * Environments are project-local prefixes under .pyve/envs/<name>.
 * The binary is looked up in the project sandbox (.pyve/bin), the user
 * sandbox ($PYVE_HOME/bin), the configured path, then PATH.
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { PyveSettings } from '../../types/config.js';
import type { ProjectContext } from '../context.js';
import type { CommandRunner } from '../exec.js';
import { PyveError } from '../errors.js';
import { getLogger } from '../logger.js';
import { getEnvsDir, getMicromambaPrefix, getPyveDir } from '../paths.js';

export type MicromambaLocation = 'project' | 'user' | 'configured' | 'system';

export interface MicromambaBinary {
  path: string;
  location: MicromambaLocation;
}

export async function findMicromamba(
  root: string,
  home: string,
  settings: PyveSettings,
  runner: CommandRunner,
): Promise<MicromambaBinary | null> {
  const projectBin = join(getPyveDir(root), 'bin', 'micromamba');
  if (existsSync(projectBin)) return { path: projectBin, location: 'project' };

  const userBin = join(home, 'bin', 'micromamba');
  if (existsSync(userBin)) return { path: userBin, location: 'user' };

  const configured = settings.tools.micromamba;
  if (configured !== null && (await runner.exists(configured))) {
    return { path: configured, location: 'configured' };
  }

  if (await runner.exists('micromamba')) return { path: 'micromamba', location: 'system' };
  return null;
}

export async function requireMicromamba(ctx: ProjectContext): Promise<MicromambaBinary> {
  const binary = await findMicromamba(ctx.root, ctx.home, ctx.settings, ctx.runner);
  if (!binary) {
    throw new PyveError('TOOL_NOT_FOUND', "Backend 'micromamba' required but not found", {
      fix: `Install micromamba (e.g. 'brew install micromamba') or place it in .pyve/bin/ or ${join(ctx.home, 'bin')}/`,
    });
  }
  return binary;
}

/** First x.y.z in `micromamba --version`, or null. */
export async function getMicromambaVersion(runner: CommandRunner, binary: string): Promise<string | null> {
  const result = await runner.run(binary, ['--version']);
  if (result.code !== 0) return null;
  const match = /\d+\.\d+\.\d+/.exec(result.stdout);
  return match ? match[0] : null;
}

/**
 * Create the project-local environment `name` from a manifest.
 * An existing prefix is left alone.
 */
export async function createMicromambaEnv(
  ctx: ProjectContext,
  name: string,
  environmentFile: string,
): Promise<'created' | 'exists'> {
  const log = getLogger('backend');
  const { root, runner, reporter } = ctx;
  const prefix = getMicromambaPrefix(root, name);

  if (existsSync(prefix)) {
    reporter.info(`Micromamba environment '${name}' already exists, skipping creation`);
    return 'exists';
  }

  const binary = await requireMicromamba(ctx);
  await mkdir(getEnvsDir(root), { recursive: true });

  reporter.info(`Creating micromamba environment '${name}' from ${environmentFile}...`);
  log.info({ prefix, environmentFile, binary: binary.path }, 'creating micromamba env');
  const result = await runner.run(binary.path, ['create', '-p', prefix, '-f', environmentFile, '-y'], { cwd: root });
  if (result.code !== 0) {
    throw new PyveError('COMMAND_FAILED', `Failed to create micromamba environment: ${result.stderr.trim()}`, {
      fix: 'Check that all channels are accessible, all packages are available and the environment file is valid',
    });
  }
  reporter.success(`Micromamba environment '${name}' created successfully`);
  return 'created';
}
