/**
 * Micromamba environment naming.
 */

import { basename } from 'node:path';
import { PyveError } from '../errors.js';
import { readEnvironmentSpec } from './environment-file.js';

export const RESERVED_ENVIRONMENT_NAMES = ['base', 'root', 'default', 'conda', 'mamba', 'micromamba'];

const MAX_NAME_LENGTH = 255;

/**
 * Turn an arbitrary directory name into a usable environment name.
 * Returns '' for input with nothing usable.
 */
export function sanitizeEnvironmentName(raw: string): string {
  if (!raw) return '';
  let name = raw
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
  if (!/^[a-z_]/.test(name)) name = `env-${name}`;
  return name.slice(0, MAX_NAME_LENGTH);
}

export function isReservedEnvironmentName(name: string): boolean {
  return RESERVED_ENVIRONMENT_NAMES.includes(name);
}

/** Throws INVALID_INPUT when the name cannot be used. */
export function validateEnvironmentName(name: string): void {
  if (!name) {
    throw new PyveError('INVALID_INPUT', 'Environment name cannot be empty');
  }
  if (isReservedEnvironmentName(name)) {
    throw new PyveError('INVALID_INPUT', `Environment name '${name}' is reserved`, {
      fix: `Reserved names: ${RESERVED_ENVIRONMENT_NAMES.join(', ')}`,
    });
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new PyveError('INVALID_INPUT', `Environment name too long (max ${MAX_NAME_LENGTH} characters): ${name}`);
  }
  if (!/^[a-zA-Z0-9_-]+$/.test(name)) {
    throw new PyveError('INVALID_INPUT', `Invalid environment name: ${name}`, {
      fix: 'Use only alphanumeric characters, hyphens, and underscores',
    });
  }
  if (!/^[a-zA-Z_]/.test(name)) {
    throw new PyveError('INVALID_INPUT', `Environment name must start with letter or underscore: ${name}`);
  }
}

/**
 * Resolve the environment name.
 * Priority: explicit name > config > environment.yml `name:` > sanitized
 * project directory name.
 */
export async function resolveEnvironmentName(
  root: string,
  explicit?: string,
  configured?: string,
): Promise<string> {
  if (explicit) return explicit;
  if (configured) return configured;

  const spec = await readEnvironmentSpec(root);
  if (spec?.name) return spec.name;

  return sanitizeEnvironmentName(basename(root));
}
