/**
 * Project config file (.pyve/config).
 *
 * The file is YAML, read with the failsafe schema so every scalar stays a
 * string ("3.10" must not become 3.1), shape-checked with zod, and always
 * rewritten whole through atomicWrite.
 */

import { Document, isScalar, parse, Scalar } from 'yaml';
import { z } from 'zod';
import { existsSync } from 'node:fs';
import { unlink } from 'node:fs/promises';
import { BACKENDS, type Backend, type ProjectConfig } from '../../types/config.js';
import { atomicWrite, safeReadFile } from '../../store/atomic.js';
import { PyveError, isErrnoException } from '../errors.js';
import { getConfigPath } from '../paths.js';

function emptyToUndefined(value: unknown): unknown {
  if (value === null || value === '' || value === '~' || value === 'null') return undefined;
  return value;
}

const scalar = z.preprocess(emptyToUndefined, z.string().optional());

function section<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(emptyToUndefined, z.object(shape).optional());
}

const rawConfigSchema = z.object({
  pyve_version: scalar,
  backend: scalar,
  venv: section({ directory: scalar }),
  python: section({ version: scalar }),
  micromamba: section({ env_name: scalar }),
});

export function isBackend(value: string): value is Backend {
  return BACKENDS.some((b) => b === value);
}

/**
 * Parse config file text into a ProjectConfig.
 * Unparsable text, a missing backend or an unknown backend is CONFIG_CORRUPT.
 */
export function parseProjectConfig(text: string, source = 'config'): ProjectConfig {
  let raw: unknown;
  try {
    raw = parse(text, { schema: 'failsafe' });
  } catch (err) {
    throw new PyveError('CONFIG_CORRUPT', `Unparsable ${source}`, { cause: err });
  }

  const result = rawConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'document';
    throw new PyveError('CONFIG_CORRUPT', `Malformed ${source}: ${where}`);
  }

  const data = result.data;
  if (data.backend === undefined) {
    throw new PyveError('CONFIG_CORRUPT', `No backend specified in ${source}`);
  }
  const backend = data.backend.trim();
  if (!isBackend(backend)) {
    throw new PyveError('CONFIG_CORRUPT', `Unknown backend: ${backend}`);
  }

  const config: ProjectConfig = { backend };
  if (data.pyve_version !== undefined) config.version = data.pyve_version.trim();
  if (data.venv?.directory !== undefined) config.venvDirectory = data.venv.directory;
  if (data.python?.version !== undefined) config.pythonVersion = data.python.version;
  if (data.micromamba?.env_name !== undefined) config.environmentName = data.micromamba.env_name;
  return config;
}

/**
 * Serialize a ProjectConfig. Key order is fixed: pyve_version, backend,
 * venv, python, micromamba. The version is always double-quoted.
 */
export function serializeProjectConfig(config: ProjectConfig): string {
  const plain: Record<string, unknown> = {};
  if (config.version !== undefined) plain['pyve_version'] = config.version;
  plain['backend'] = config.backend;
  if (config.venvDirectory !== undefined) plain['venv'] = { directory: config.venvDirectory };
  if (config.pythonVersion !== undefined) plain['python'] = { version: config.pythonVersion };
  if (config.environmentName !== undefined) plain['micromamba'] = { env_name: config.environmentName };

  const doc = new Document(plain);
  const versionNode = doc.get('pyve_version', true);
  if (isScalar(versionNode)) versionNode.type = Scalar.QUOTE_DOUBLE;
  return doc.toString();
}

/**
 * Read the project config.
 * Returns null when the file does not exist.
 */
export async function readProjectConfig(root: string): Promise<ProjectConfig | null> {
  const path = getConfigPath(root);
  const text = await safeReadFile(path);
  if (text === null) return null;
  return parseProjectConfig(text, path);
}

/** Replace the project config atomically. */
export async function saveProjectConfig(root: string, config: ProjectConfig): Promise<void> {
  await atomicWrite(getConfigPath(root), serializeProjectConfig(config));
}

/** Remove the project config. Missing file is not an error. */
export async function deleteProjectConfig(root: string): Promise<void> {
  try {
    await unlink(getConfigPath(root));
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return;
    throw new PyveError('FILE_ERROR', `Failed to remove ${getConfigPath(root)}`, { cause: err });
  }
}

/** What is on disk for a project. */
export type ProjectState =
  | { kind: 'none' }
  | { kind: 'configured'; config: ProjectConfig }
  | { kind: 'corrupt'; reason: string };

/** Inspect a project without throwing on a corrupt config. */
export async function inspectProject(root: string): Promise<ProjectState> {
  if (!existsSync(getConfigPath(root))) return { kind: 'none' };
  try {
    const config = await readProjectConfig(root);
    return config ? { kind: 'configured', config } : { kind: 'none' };
  } catch (err) {
    if (err instanceof PyveError && err.kind === 'CONFIG_CORRUPT') {
      return { kind: 'corrupt', reason: err.message };
    }
    throw err;
  }
}
