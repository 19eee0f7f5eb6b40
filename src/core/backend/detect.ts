/**
 * Backend selection.
 *
 * Priority: explicit --backend (unless "auto") > project config > project
 * files > venv.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Backend } from '../../types/config.js';
import type { Reporter } from '../output.js';
import { PyveError } from '../errors.js';
import { isBackend } from '../project/config.js';

export type FileDetection = Backend | 'ambiguous' | 'none';

/** Classify a project by the package manifests it carries. */
export function detectBackendFromFiles(root: string): FileDetection {
  const hasConda = existsSync(join(root, 'environment.yml')) || existsSync(join(root, 'conda-lock.yml'));
  const hasPython = existsSync(join(root, 'pyproject.toml')) || existsSync(join(root, 'requirements.txt'));

  if (hasConda && hasPython) return 'ambiguous';
  if (hasConda) return 'micromamba';
  if (hasPython) return 'venv';
  return 'none';
}

/**
 * Parse a --backend value. "auto" (and no value) mean "not specified".
 */
export function parseBackendOption(value: string | undefined): Backend | undefined {
  if (value === undefined || value === 'auto') return undefined;
  if (isBackend(value)) return value;
  throw new PyveError('INVALID_INPUT', `Invalid backend: ${value}`, {
    fix: 'Valid backends: venv, micromamba, auto',
  });
}

/** Resolve the backend for a fresh initialization. */
export function resolveBackend(
  root: string,
  requested: Backend | undefined,
  configured: Backend | undefined,
  reporter: Reporter,
): Backend {
  if (requested) return requested;
  if (configured) return configured;

  const detected = detectBackendFromFiles(root);
  if (detected === 'ambiguous') {
    reporter.warn('Both conda and Python package files detected');
    reporter.warn('Please specify backend explicitly with --backend flag or .pyve/config');
    reporter.warn('  --backend venv        Use Python venv');
    reporter.warn('  --backend micromamba  Use micromamba');
    return 'venv';
  }
  if (detected === 'micromamba') return 'micromamba';
  return 'venv';
}
