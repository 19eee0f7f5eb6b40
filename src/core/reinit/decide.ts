/**
 * Re-initialization decision table.
 *
 * Pure: given what is on disk, what was requested, the non-interactive
 * policy and (optionally) the user's menu choice, pick exactly one outcome.
 * Side effects live in reconcile.ts.
 */

import type { Backend, ProjectConfig } from '../../types/config.js';
import type { ProjectState } from '../project/config.js';
import { PyveError } from '../errors.js';

export type InitMode = 'none' | 'update' | 'force';

/** Built from CLI flags. */
export interface InitRequest {
  /** Requested backend; absent means keep the existing one (or detect). */
  backend?: Backend;
  mode: InitMode;
  venvDirectory?: string;
  pythonVersion?: string;
  environmentName?: string;
  direnv: boolean;
}

/** Answer to the three-option menu. */
export type ReinitChoice = 'update' | 'force' | 'cancel';

export interface ReinitPolicy {
  /** Auto-confirm every prompt. */
  autoYes: boolean;
  /** Non-interactive environment: skip the menu. */
  ci: boolean;
  toolVersion: string;
}

export type ReinitOutcome =
  | { kind: 'fresh'; backend?: Backend }
  | { kind: 'needs-choice' }
  | {
      kind: 'update';
      config: ProjectConfig;
      previousVersion?: string;
      nextVersion: string;
      legacy: boolean;
      /** False when the recorded version already matches. */
      changed: boolean;
    }
  | { kind: 'force'; confirm: boolean; backend?: Backend; previous?: ProjectConfig }
  | { kind: 'cancel' }
  | { kind: 'conflict'; current: Backend; requested: Backend }
  | { kind: 'corrupt'; reason: string };

/**
 * Parse a menu answer. Only the literal characters 1, 2 and 3 are valid.
 */
export function parseReinitChoice(input: string | null): ReinitChoice {
  switch (input?.trim()) {
    case '1': return 'update';
    case '2': return 'force';
    case '3': return 'cancel';
    default:
      throw new PyveError('INVALID_CHOICE', `Invalid choice: ${input?.trim() ?? '(no input)'}`, {
        fix: 'Enter 1, 2 or 3',
      });
  }
}

export function decideReinit(
  existing: ProjectState,
  request: InitRequest,
  policy: ReinitPolicy,
  choice?: ReinitChoice,
): ReinitOutcome {
  if (existing.kind === 'none') {
    return { kind: 'fresh', backend: request.backend };
  }

  let mode = request.mode;
  let chosenFromMenu = false;
  if (mode === 'none') {
    if (choice === undefined) {
      if (!policy.autoYes && !policy.ci) return { kind: 'needs-choice' };
      mode = 'update';
    } else if (choice === 'cancel') {
      return { kind: 'cancel' };
    } else {
      mode = choice;
      chosenFromMenu = true;
    }
  }

  if (mode === 'update') {
    if (existing.kind === 'corrupt') return { kind: 'corrupt', reason: existing.reason };
    const config = existing.config;
    if (request.backend !== undefined && request.backend !== config.backend) {
      return { kind: 'conflict', current: config.backend, requested: request.backend };
    }
    return {
      kind: 'update',
      config,
      previousVersion: config.version,
      nextVersion: policy.toolVersion,
      legacy: config.version === undefined,
      changed: config.version !== policy.toolVersion,
    };
  }

  const previous = existing.kind === 'configured' ? existing.config : undefined;
  return {
    kind: 'force',
    // Picking "2" from the menu is the confirmation.
    confirm: !chosenFromMenu && !policy.autoYes,
    backend: request.backend ?? previous?.backend,
    previous,
  };
}
