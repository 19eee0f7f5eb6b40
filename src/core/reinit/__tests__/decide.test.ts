import { describe, it, expect } from 'vitest';
import type { ProjectState } from '../../project/config.js';
import { decideReinit, parseReinitChoice, type InitRequest, type ReinitPolicy } from '../decide.js';

const interactive: ReinitPolicy = { autoYes: false, ci: false, toolVersion: '0.8.9' };

function request(overrides: Partial<InitRequest> = {}): InitRequest {
  return { mode: 'none', direnv: true, ...overrides };
}

const venvProject: ProjectState = {
  kind: 'configured',
  config: { backend: 'venv', version: '0.7.0', venvDirectory: '.venv' },
};

const legacyProject: ProjectState = { kind: 'configured', config: { backend: 'venv' } };

const corruptProject: ProjectState = { kind: 'corrupt', reason: 'Unknown backend: conda' };

describe('parseReinitChoice', () => {
  it('maps 1, 2 and 3', () => {
    expect(parseReinitChoice('1')).toBe('update');
    expect(parseReinitChoice(' 2\n')).toBe('force');
    expect(parseReinitChoice('3')).toBe('cancel');
  });

  it('rejects anything else', () => {
    expect(() => parseReinitChoice('4')).toThrow('Invalid choice: 4');
    expect(() => parseReinitChoice('yes')).toThrow('Invalid choice: yes');
    expect(() => parseReinitChoice(null)).toThrow('Invalid choice: (no input)');
  });
});

describe('decideReinit', () => {
  it('initializes fresh when nothing exists', () => {
    expect(decideReinit({ kind: 'none' }, request({ mode: 'force', backend: 'micromamba' }), interactive)).toEqual({
      kind: 'fresh',
      backend: 'micromamba',
    });
  });

  it('asks for a choice when interactive and no mode is given', () => {
    expect(decideReinit(venvProject, request(), interactive)).toEqual({ kind: 'needs-choice' });
    expect(decideReinit(corruptProject, request(), interactive)).toEqual({ kind: 'needs-choice' });
  });

  it('updates without asking under CI or auto-yes', () => {
    for (const policy of [{ ...interactive, ci: true }, { ...interactive, autoYes: true }]) {
      expect(decideReinit(venvProject, request(), policy)).toMatchObject({ kind: 'update', nextVersion: '0.8.9' });
    }
  });

  it('maps menu choices', () => {
    expect(decideReinit(venvProject, request(), interactive, 'update')).toMatchObject({ kind: 'update' });
    expect(decideReinit(venvProject, request(), interactive, 'force')).toEqual({
      kind: 'force',
      confirm: false,
      backend: 'venv',
      previous: { backend: 'venv', version: '0.7.0', venvDirectory: '.venv' },
    });
    expect(decideReinit(venvProject, request(), interactive, 'cancel')).toEqual({ kind: 'cancel' });
  });

  it('updates the recorded version only', () => {
    expect(decideReinit(venvProject, request({ mode: 'update' }), interactive)).toEqual({
      kind: 'update',
      config: { backend: 'venv', version: '0.7.0', venvDirectory: '.venv' },
      previousVersion: '0.7.0',
      nextVersion: '0.8.9',
      legacy: false,
      changed: true,
    });
  });

  it('flags a legacy project on update', () => {
    expect(decideReinit(legacyProject, request({ mode: 'update' }), interactive)).toMatchObject({
      kind: 'update',
      previousVersion: undefined,
      legacy: true,
      changed: true,
    });
  });

  it('reports nothing to change when the version already matches', () => {
    const current: ProjectState = { kind: 'configured', config: { backend: 'venv', version: '0.8.9' } };
    expect(decideReinit(current, request({ mode: 'update' }), interactive)).toMatchObject({
      kind: 'update',
      changed: false,
    });
  });

  it('keeps the same backend on update', () => {
    expect(decideReinit(venvProject, request({ mode: 'update', backend: 'venv' }), interactive)).toMatchObject({
      kind: 'update',
    });
  });

  it('refuses a backend change on update', () => {
    expect(decideReinit(venvProject, request({ mode: 'update', backend: 'micromamba' }), interactive)).toEqual({
      kind: 'conflict',
      current: 'venv',
      requested: 'micromamba',
    });
  });

  it('refuses to update a corrupt config', () => {
    expect(decideReinit(corruptProject, request({ mode: 'update' }), interactive)).toEqual({
      kind: 'corrupt',
      reason: 'Unknown backend: conda',
    });
    expect(decideReinit(corruptProject, request(), interactive, 'update')).toEqual({
      kind: 'corrupt',
      reason: 'Unknown backend: conda',
    });
  });

  it('asks to confirm an explicit force unless auto-yes', () => {
    expect(decideReinit(venvProject, request({ mode: 'force' }), interactive)).toMatchObject({
      kind: 'force',
      confirm: true,
    });
    expect(decideReinit(venvProject, request({ mode: 'force' }), { ...interactive, ci: true })).toMatchObject({
      kind: 'force',
      confirm: true,
    });
    expect(decideReinit(venvProject, request({ mode: 'force' }), { ...interactive, autoYes: true })).toMatchObject({
      kind: 'force',
      confirm: false,
    });
  });

  it('switches backend only through force', () => {
    expect(decideReinit(venvProject, request({ mode: 'force', backend: 'micromamba' }), interactive)).toMatchObject({
      kind: 'force',
      backend: 'micromamba',
    });
  });

  it('forces over a corrupt config with no previous settings', () => {
    expect(decideReinit(corruptProject, request({ mode: 'force' }), interactive)).toEqual({
      kind: 'force',
      confirm: true,
      backend: undefined,
      previous: undefined,
    });
  });
});
