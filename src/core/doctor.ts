/**
 * Environment diagnostics (pyve doctor).
 *
 * Unlike validation, doctor runs the environment's tools: it asks the
 * interpreter for its version and micromamba for its own.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ProjectConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import type { ProjectContext } from './context.js';
import { detectEnvironmentFile, findMicromamba, getMicromambaVersion, locateEnvironment } from './backend/index.js';
import type { EnvironmentLocation } from './backend/index.js';
import { PyveError } from './errors.js';
import { getLogger } from './logger.js';
import { DIRENV_FILE_NAME, getEnvsDir } from './paths.js';
import { venvPython } from './platform.js';
import { inspectProject } from './project/config.js';
import { checkRecordedVersion } from './version.js';

export type DiagnosticStatus = 'ok' | 'warning' | 'error';

export interface DiagnosticCheck {
  check: string;
  status: DiagnosticStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  initialized: boolean;
  checks: DiagnosticCheck[];
  exitCode: ExitCode;
}

export const NOT_INITIALIZED_MESSAGE = 'Pyve is not initialized in this project (no environment found)';

function finish(checks: DiagnosticCheck[]): DoctorReport {
  const failed = checks.some((c) => c.status === 'error');
  return { initialized: true, checks, exitCode: failed ? ExitCode.FAILURE : ExitCode.SUCCESS };
}

/** First x.y.z in `python --version` output (some interpreters print to stderr). */
export function parsePythonVersion(output: string): string | null {
  const match = /Python\s+(\d+\.\d+\.\d+\S*)/.exec(output);
  return match?.[1] ?? null;
}

async function checkInterpreter(ctx: ProjectContext, location: EnvironmentLocation): Promise<DiagnosticCheck> {
  const python = venvPython(location.path);
  const result = await ctx.runner.run(python, ['--version'], { cwd: ctx.root });
  const version = result.code === 0 ? parsePythonVersion(`${result.stdout}\n${result.stderr}`) : null;
  if (version === null) {
    return {
      check: 'python',
      status: 'error',
      message: `Python: not runnable in ${location.relativePath}`,
      fix: "Run 'pyve --init --force' to rebuild the environment",
    };
  }
  return { check: 'python', status: 'ok', message: `Python: ${version}` };
}

async function checkMicromamba(ctx: ProjectContext): Promise<DiagnosticCheck[]> {
  const checks: DiagnosticCheck[] = [];
  const binary = await findMicromamba(ctx.root, ctx.home, ctx.settings, ctx.runner);
  if (!binary) {
    checks.push({
      check: 'micromamba',
      status: 'error',
      message: 'Micromamba: not found',
      fix: 'Install micromamba or place it in .pyve/bin/',
    });
  } else {
    const version = await getMicromambaVersion(ctx.runner, binary.path);
    checks.push({
      check: 'micromamba',
      status: 'ok',
      message: `Micromamba: ${binary.path} (${binary.location}) v${version ?? 'unknown'}`,
    });
  }

  const manifest = detectEnvironmentFile(ctx.root);
  checks.push(manifest
    ? { check: 'manifest', status: 'ok', message: `Environment file: ${manifest}` }
    : { check: 'manifest', status: 'warning', message: 'Environment file: not found' });
  return checks;
}

function checkVersion(ctx: ProjectContext, config: ProjectConfig): DiagnosticCheck {
  const status = checkRecordedVersion(config.version, ctx.toolVersion, {
    skip: ctx.settings.behavior.skipVersionCheck,
  });
  switch (status.kind) {
    case 'current':
    case 'skipped':
      return { check: 'version', status: 'ok', message: `Pyve version: ${config.version ?? 'not recorded'}` };
    case 'legacy':
      return {
        check: 'version',
        status: 'warning',
        message: 'Pyve version: not recorded (legacy project)',
        fix: "Run 'pyve --init --update'",
      };
    case 'older':
    case 'newer':
      return {
        check: 'version',
        status: 'warning',
        message: `Pyve version: ${status.recorded} (current: ${ctx.toolVersion})`,
        fix: "Run 'pyve --init --update'",
      };
  }
}

export async function runDoctor(ctx: ProjectContext): Promise<DoctorReport> {
  const log = getLogger('doctor');
  const { root, settings } = ctx;
  const state = await inspectProject(root);

  if (state.kind === 'none') {
    const stray = existsSync(join(root, settings.defaults.venvDirectory)) || existsSync(getEnvsDir(root));
    if (!stray) return { initialized: false, checks: [], exitCode: ExitCode.SUCCESS };
    return finish([{
      check: 'config',
      status: 'error',
      message: 'Configuration: missing .pyve/config (environment found)',
      fix: "Run 'pyve --init --force' to re-initialize",
    }]);
  }

  if (state.kind === 'corrupt') {
    return finish([{
      check: 'config',
      status: 'error',
      message: `Configuration: ${state.reason}`,
      fix: "Run 'pyve --init --force' to re-initialize",
    }]);
  }

  const { config } = state;
  const checks: DiagnosticCheck[] = [
    { check: 'backend', status: 'ok', message: `Backend: ${config.backend}` },
  ];

  let location: EnvironmentLocation;
  try {
    location = await locateEnvironment(root, config, settings);
  } catch (err) {
    if (!(err instanceof PyveError)) throw err;
    checks.push({ check: 'environment', status: 'error', message: `Environment: ${err.message}` });
    return finish(checks);
  }

  const exists = existsSync(location.path);
  if (exists) {
    checks.push({ check: 'environment', status: 'ok', message: `Environment: ${location.relativePath}` });
  } else {
    checks.push({
      check: 'environment',
      status: 'error',
      message: `Environment: ${location.relativePath} (not found)`,
      fix: "Run 'pyve --init' to create it",
    });
  }

  if (config.backend === 'micromamba') {
    checks.push(...(await checkMicromamba(ctx)));
  }
  if (exists) {
    checks.push(await checkInterpreter(ctx, location));
  }
  checks.push(checkVersion(ctx, config));

  if (config.pythonVersion !== undefined) {
    checks.push({ check: 'python_version', status: 'ok', message: `Pinned Python version: ${config.pythonVersion}` });
  }
  if (existsSync(join(root, DIRENV_FILE_NAME))) {
    checks.push({ check: 'direnv', status: 'ok', message: `direnv: ${DIRENV_FILE_NAME} present` });
  }

  const report = finish(checks);
  log.debug({ root, exitCode: report.exitCode, checks: checks.length }, 'doctor');
  return report;
}
