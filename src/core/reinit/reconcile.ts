/**
 * Carries out a re-initialization decision.
 *
 * Only ever finishes with SUCCESS or a thrown PyveError (exit 1).
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { Backend, ProjectConfig } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ProjectContext } from '../context.js';
import { resolveBackend } from '../backend/index.js';
import { PyveError } from '../errors.js';
import { applyInitPlan, initializeProject, planInit, type InitOptions } from '../init.js';
import { getLogger } from '../logger.js';
import { DIRENV_FILE_NAME } from '../paths.js';
import { confirm } from '../prompt.js';
import { deleteProjectConfig, inspectProject, saveProjectConfig, type ProjectState } from '../project/config.js';
import { removeProjectEnvironment } from '../purge.js';
import { decideReinit, parseReinitChoice, type InitRequest, type ReinitOutcome, type ReinitPolicy } from './decide.js';

type Outcome<K extends ReinitOutcome['kind']> = Extract<ReinitOutcome, { kind: K }>;

function describeVersion(config: ProjectConfig, toolVersion: string): string {
  if (config.version === undefined) return 'not recorded (legacy project)';
  if (config.version === toolVersion) return `${config.version} (current)`;
  return `${config.version} (current: ${toolVersion})`;
}

function printMenu(ctx: ProjectContext, existing: Exclude<ProjectState, { kind: 'none' }>): void {
  const { reporter } = ctx;
  reporter.print('Pyve is already initialized in this project.');
  if (existing.kind === 'configured') {
    reporter.print(`  Backend: ${existing.config.backend}`);
    reporter.print(`  Pyve version: ${describeVersion(existing.config, ctx.toolVersion)}`);
  } else {
    reporter.print(`  Configuration: unreadable (${existing.reason})`);
  }
  reporter.print('');
  reporter.print('What would you like to do?');
  reporter.print('  1. Update in place (keep environment, refresh configuration)');
  reporter.print('  2. Purge and re-initialize');
  reporter.print('  3. Cancel');
}

async function applyUpdate(ctx: ProjectContext, outcome: Outcome<'update'>): Promise<void> {
  const { reporter, root } = ctx;
  reporter.print('Updating existing Pyve installation...');

  if (outcome.legacy) {
    reporter.info(`Pyve version: not recorded (legacy project) → ${outcome.nextVersion}`);
  } else if (outcome.changed) {
    reporter.info(`Pyve version: ${outcome.previousVersion ?? ''} → ${outcome.nextVersion}`);
  } else {
    reporter.info(`Pyve version: ${outcome.nextVersion} (unchanged)`);
  }

  if (outcome.changed) {
    await saveProjectConfig(root, { ...outcome.config, version: outcome.nextVersion });
  }
  reporter.success('Configuration updated');
}

/** An in-place update keeps the environment where it is. */
function checkVenvDirectoryUnchanged(ctx: ProjectContext, request: InitRequest, config: ProjectConfig): void {
  if (config.backend !== 'venv' || request.venvDirectory === undefined) return;
  const current = config.venvDirectory ?? ctx.settings.defaults.venvDirectory;
  if (request.venvDirectory === current) return;
  throw new PyveError(
    'INVALID_INPUT',
    `Cannot update in-place: venv directory change detected (${current} → ${request.venvDirectory})`,
    { fix: `Use 'pyve --init ${request.venvDirectory} --force' to rebuild the environment there` },
  );
}

/** Settings carried from the previous config into the fresh one. */
function carryOver(request: InitRequest, backend: Backend, previous: ProjectConfig | undefined): InitOptions {
  const same = previous?.backend === backend ? previous : undefined;
  return {
    backend,
    venvDirectory: request.venvDirectory ?? same?.venvDirectory,
    pythonVersion: request.pythonVersion ?? same?.pythonVersion,
    environmentName: request.environmentName ?? same?.environmentName,
    direnv: request.direnv,
  };
}

async function applyForce(ctx: ProjectContext, request: InitRequest, outcome: Outcome<'force'>): Promise<ExitCode> {
  const log = getLogger('reinit');
  const { reporter, root } = ctx;

  reporter.print('Force re-initialization: the existing environment will be purged.');
  if (outcome.confirm && !(await confirm(ctx.prompter, reporter, 'Continue?'))) {
    reporter.print('Re-initialization cancelled.');
    return ExitCode.SUCCESS;
  }

  // Nothing is removed until the rebuild's inputs check out
  const backend = resolveBackend(root, outcome.backend, undefined, reporter);
  const plan = await planInit(ctx, carryOver(request, backend, outcome.previous));

  reporter.print('Purging existing environment...');
  const removed = await removeProjectEnvironment(ctx, outcome.previous);
  for (const path of removed) reporter.success(`Removed ${path}`);

  // .envrc points at the old environment; .env is kept
  await rm(join(root, DIRENV_FILE_NAME), { force: true });
  await deleteProjectConfig(root);
  log.info({ root, removed, backend }, 'force reinit');

  await applyInitPlan(ctx, plan);
  return ExitCode.SUCCESS;
}

/**
 * Initialize a project, or reconcile an existing one with the request.
 */
export async function reconcileInit(ctx: ProjectContext, request: InitRequest): Promise<ExitCode> {
  const log = getLogger('reinit');
  const { reporter, root, settings } = ctx;
  const existing = await inspectProject(root);
  const policy: ReinitPolicy = {
    autoYes: settings.behavior.autoYes,
    ci: settings.behavior.ci,
    toolVersion: ctx.toolVersion,
  };

  let outcome = decideReinit(existing, request, policy);
  if (outcome.kind === 'needs-choice' && existing.kind !== 'none') {
    printMenu(ctx, existing);
    const answer = await ctx.prompter.ask('Enter choice [1-3]: ');
    outcome = decideReinit(existing, request, policy, parseReinitChoice(answer));
  } else if (existing.kind !== 'none' && request.mode === 'none') {
    reporter.info('Non-interactive mode: updating existing installation in place');
  }
  log.debug({ root, outcome: outcome.kind, mode: request.mode }, 'reinit decision');

  switch (outcome.kind) {
    case 'fresh': {
      const backend = resolveBackend(root, outcome.backend, undefined, reporter);
      await initializeProject(ctx, carryOver(request, backend, undefined));
      return ExitCode.SUCCESS;
    }
    case 'cancel':
      reporter.print('Re-initialization cancelled.');
      return ExitCode.SUCCESS;
    case 'conflict':
      throw new PyveError(
        'BACKEND_CONFLICT',
        `Cannot update in-place: backend change detected (${outcome.current} → ${outcome.requested})`,
        { fix: "Use 'pyve --init --force' to switch backends (the existing environment will be purged)" },
      );
    case 'corrupt':
      throw new PyveError('CONFIG_CORRUPT', `Cannot update in-place: ${outcome.reason}`, {
        fix: "Use 'pyve --init --force' to re-initialize",
      });
    case 'update':
      checkVenvDirectoryUnchanged(ctx, request, outcome.config);
      await applyUpdate(ctx, outcome);
      return ExitCode.SUCCESS;
    case 'force':
      return applyForce(ctx, request, outcome);
    case 'needs-choice':
      throw new PyveError('INVALID_CHOICE', 'Invalid choice');
  }
}
