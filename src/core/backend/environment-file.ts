/**
 * Conda environment manifests (conda-lock.yml, environment.yml).
 */

import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { PyveError } from '../errors.js';
import { safeReadFile } from '../../store/atomic.js';

export const LOCK_FILE_NAME = 'conda-lock.yml';
export const ENVIRONMENT_FILE_NAME = 'environment.yml';

/** Manifest to build from. A lock file wins over environment.yml. */
export function detectEnvironmentFile(root: string): string | null {
  if (existsSync(join(root, LOCK_FILE_NAME))) return LOCK_FILE_NAME;
  if (existsSync(join(root, ENVIRONMENT_FILE_NAME))) return ENVIRONMENT_FILE_NAME;
  return null;
}

export function requireEnvironmentFile(root: string): string {
  const file = detectEnvironmentFile(root);
  if (file === null) {
    throw new PyveError('MISSING_MANIFEST', 'No environment file found for micromamba backend', {
      fix: `Create ${ENVIRONMENT_FILE_NAME} (name, channels, dependencies) or generate ${LOCK_FILE_NAME} with conda-lock`,
    });
  }
  return file;
}

export interface EnvironmentSpec {
  name?: string;
  channels: string[];
  hasDependencies: boolean;
}

/**
 * Read the top-level fields of environment.yml.
 * Returns null when the file does not exist.
 */
export async function readEnvironmentSpec(root: string): Promise<EnvironmentSpec | null> {
  const path = join(root, ENVIRONMENT_FILE_NAME);
  const text = await safeReadFile(path);
  if (text === null) return null;

  let doc: unknown;
  try {
    doc = parse(text);
  } catch (err) {
    throw new PyveError('INVALID_INPUT', `Unparsable ${ENVIRONMENT_FILE_NAME}`, { cause: err });
  }
  if (doc === null || typeof doc !== 'object' || Array.isArray(doc)) {
    return { channels: [], hasDependencies: false };
  }

  const name = 'name' in doc && doc.name !== null && doc.name !== undefined ? String(doc.name).trim() : '';
  const rawChannels: unknown = 'channels' in doc ? doc.channels : undefined;
  const channels = Array.isArray(rawChannels) ? rawChannels.map((c) => String(c)) : [];
  const hasDependencies = 'dependencies' in doc && doc.dependencies !== null && doc.dependencies !== undefined;

  return { ...(name ? { name } : {}), channels, hasDependencies };
}

/**
 * Lock file relative to environment.yml.
 * 'stale' means environment.yml was modified after conda-lock.yml.
 */
export type LockFileStatus = 'fresh' | 'stale' | 'missing' | 'lock-only' | 'none';

export function checkLockFileStatus(root: string): LockFileStatus {
  const envPath = join(root, ENVIRONMENT_FILE_NAME);
  const lockPath = join(root, LOCK_FILE_NAME);
  const hasEnv = existsSync(envPath);
  const hasLock = existsSync(lockPath);

  if (hasEnv && hasLock) {
    return statSync(envPath).mtimeMs > statSync(lockPath).mtimeMs ? 'stale' : 'fresh';
  }
  if (hasEnv) return 'missing';
  if (hasLock) return 'lock-only';
  return 'none';
}
