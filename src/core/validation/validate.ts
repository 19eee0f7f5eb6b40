/**
 * Project validation (--validate).
 *
 * Read-only. Produces an ordered list of checks and an exit code where the
 * worst severity wins: any fail -> 1, otherwise any warn -> 2, otherwise 0.
 * A missing or unreadable config short-circuits the report.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ProjectConfig, PyveSettings } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { detectEnvironmentFile, ENVIRONMENT_FILE_NAME } from '../backend/environment-file.js';
import { locateEnvironment, type EnvironmentLocation } from '../backend/index.js';
import { PyveError } from '../errors.js';
import { DIRENV_FILE_NAME, getConfigPath, getPyveDir } from '../paths.js';
import { readProjectConfig } from '../project/config.js';
import { checkRecordedVersion } from '../version.js';

// ============================================================================
// Types
// ============================================================================

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface ValidationCheck {
  id: string;
  /** Short subject, e.g. "Backend". */
  label: string;
  status: CheckStatus;
  /** Value or state, e.g. "venv" or ".venv (missing)". */
  detail: string;
  fix: string | null;
}

export interface ValidationReport {
  root: string;
  checks: ValidationCheck[];
  exitCode: ExitCode;
}

export interface ValidateOptions {
  toolVersion: string;
  settings: PyveSettings;
}

/** Worst severity wins. */
export function reportExitCode(checks: ValidationCheck[]): ExitCode {
  if (checks.some((c) => c.status === 'fail')) return ExitCode.FAILURE;
  if (checks.some((c) => c.status === 'warn')) return ExitCode.WARNINGS;
  return ExitCode.SUCCESS;
}

function check(
  id: string,
  label: string,
  status: CheckStatus,
  detail: string,
  fix: string | null = null,
): ValidationCheck {
  return { id, label, status, detail, fix };
}

// ============================================================================
// Individual checks
// ============================================================================

function checkVersion(config: ProjectConfig, options: ValidateOptions): ValidationCheck {
  const current = options.toolVersion;
  const status = checkRecordedVersion(config.version, current, {
    skip: options.settings.behavior.skipVersionCheck,
  });
  switch (status.kind) {
    case 'skipped':
      return check('version', 'Pyve version', 'pass', `${config.version ?? 'not recorded'} (check skipped)`);
    case 'current':
      return check('version', 'Pyve version', 'pass', `${status.recorded} (current)`);
    case 'legacy':
      return check('version', 'Pyve version', 'warn', 'not recorded (legacy project)',
        "Run 'pyve --init --update' to add version tracking");
    case 'older':
      return check('version', 'Pyve version', 'warn', `${status.recorded} (current: ${current})`,
        "Migration recommended. Run 'pyve --init --update' to update.");
    case 'newer':
      return check('version', 'Pyve version', 'warn', `${status.recorded} (current: ${current})`,
        'Project uses newer Pyve version. Consider upgrading.');
  }
}

async function checkEnvironment(root: string, config: ProjectConfig, settings: PyveSettings): Promise<ValidationCheck[]> {
  let location: EnvironmentLocation;
  try {
    location = await locateEnvironment(root, config, settings);
  } catch (err) {
    if (!(err instanceof PyveError)) throw err;
    return [check('environment_name', 'Environment name', 'fail', `could not determine (${err.message})`,
      'Set micromamba.env_name in .pyve/config')];
  }
  const exists = existsSync(location.path);
  const state = `${location.relativePath} (${exists ? 'exists' : 'missing'})`;

  if (config.backend === 'venv') {
    return [
      check('environment', 'Virtual environment', exists ? 'pass' : 'fail', state,
        exists ? null : "Run 'pyve --init' to create."),
    ];
  }

  const checks: ValidationCheck[] = [];
  const manifest = detectEnvironmentFile(root);
  checks.push(manifest
    ? check('manifest', 'Environment file', 'pass', `${manifest} (exists)`)
    : check('manifest', 'Environment file', 'fail', `${ENVIRONMENT_FILE_NAME} (missing)`,
      `Create ${ENVIRONMENT_FILE_NAME} or conda-lock.yml`));
  checks.push(location.name
    ? check('environment_name', 'Environment name', 'pass', location.name)
    : check('environment_name', 'Environment name', 'fail', 'could not determine', 'Set micromamba.env_name in .pyve/config'));
  checks.push(check('environment', 'Micromamba environment', exists ? 'pass' : 'fail', state,
    exists ? null : "Run 'pyve --init' to create."));
  return checks;
}

// ============================================================================
// Report
// ============================================================================

export async function validateProject(root: string, options: ValidateOptions): Promise<ValidationReport> {
  const finish = (checks: ValidationCheck[]): ValidationReport => ({ root, checks, exitCode: reportExitCode(checks) });

  if (!existsSync(getPyveDir(root))) {
    return finish([check('configuration', 'Configuration', 'fail', 'not configured (no .pyve directory)',
      "Run 'pyve --init' to initialize")]);
  }
  if (!existsSync(getConfigPath(root))) {
    return finish([check('configuration', 'Configuration', 'fail', 'not configured (missing .pyve/config)',
      "Run 'pyve --init' to initialize")]);
  }

  let config: ProjectConfig | null;
  try {
    config = await readProjectConfig(root);
  } catch (err) {
    if (err instanceof PyveError && err.kind === 'CONFIG_CORRUPT') {
      return finish([check('backend', 'Backend', 'fail', `not configured (${err.message})`,
        "Run 'pyve --init --force' to re-initialize")]);
    }
    throw err;
  }
  if (config === null) {
    return finish([check('configuration', 'Configuration', 'fail', 'not configured (missing .pyve/config)')]);
  }

  const checks: ValidationCheck[] = [
    check('configuration', 'Configuration', 'pass', 'valid'),
    check('backend', 'Backend', 'pass', config.backend),
    ...(await checkEnvironment(root, config, options.settings)),
    checkVersion(config, options),
  ];

  if (config.pythonVersion !== undefined) {
    checks.push(check('python_version', 'Python version', 'pass', config.pythonVersion));
  }
  if (existsSync(join(root, DIRENV_FILE_NAME))) {
    checks.push(check('direnv', 'direnv integration', 'pass', `${DIRENV_FILE_NAME} (exists)`));
  }

  return finish(checks);
}
