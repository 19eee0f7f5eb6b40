import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { purgeProject } from '../purge.js';
import { makeProject, makeTempProject, makeVenv, removeTempProject, writeConfigText } from './fixtures/project.js';

let root: string;

beforeEach(async () => {
  root = await makeTempProject();
});

afterEach(async () => {
  await removeTempProject(root);
});

async function initializedProject(): Promise<void> {
  await writeConfigText(root, 'pyve_version: "0.8.9"\nbackend: venv\nvenv:\n  directory: .venv\n');
  await makeVenv(root);
  await writeFile(join(root, '.envrc'), 'dotenv_if_exists\n');
  await writeFile(join(root, '.env'), '');
  await writeFile(join(root, '.gitignore'), 'node_modules\n.venv\n.env\n.envrc\n');
}

describe('purgeProject', () => {
  it('does nothing in an uninitialized project', async () => {
    const { ctx, reporter, prompter } = makeProject(root);
    expect(await purgeProject(ctx)).toBe(0);
    expect(reporter.stdout()).toEqual(['INFO: Pyve is not initialized in this project. Nothing to purge.']);
    expect(prompter.questions).toEqual([]);
  });

  it('removes the environment, direnv files, gitignore patterns and config', async () => {
    await initializedProject();
    const { ctx, reporter } = makeProject(root, { behavior: { autoYes: true } });

    expect(await purgeProject(ctx)).toBe(0);
    expect(reporter.stdout()).toEqual([
      'Purging Pyve environment...',
      '✓ Removed .venv',
      '✓ Pyve environment purged',
    ]);
    expect(existsSync(join(root, '.venv'))).toBe(false);
    expect(existsSync(join(root, '.envrc'))).toBe(false);
    expect(existsSync(join(root, '.env'))).toBe(false);
    expect(existsSync(join(root, '.pyve'))).toBe(false);
    expect(await readFile(join(root, '.gitignore'), 'utf8')).toBe('node_modules\n');
  });

  it('keeps a .env that holds data', async () => {
    await initializedProject();
    await writeFile(join(root, '.env'), 'API_KEY=test-secret\n');
    const { ctx, reporter } = makeProject(root, { behavior: { autoYes: true } });

    await purgeProject(ctx);
    expect(reporter.stderr()).toEqual(['WARNING: .env contains data and was kept']);
    expect(await readFile(join(root, '.env'), 'utf8')).toBe('API_KEY=test-secret\n');
    expect(await readFile(join(root, '.gitignore'), 'utf8')).toBe('node_modules\n.env\n');
  });

  it('preserves the test environment', async () => {
    await initializedProject();
    await mkdir(join(root, '.pyve', 'testenv', 'venv'), { recursive: true });
    const { ctx } = makeProject(root, { behavior: { autoYes: true } });

    await purgeProject(ctx);
    expect(existsSync(join(root, '.pyve', 'testenv', 'venv'))).toBe(true);
    expect(existsSync(join(root, '.pyve', 'config'))).toBe(false);
  });

  it('asks first and stops when declined', async () => {
    await initializedProject();
    const { ctx, reporter, prompter } = makeProject(root, { answers: ['n'] });

    expect(await purgeProject(ctx)).toBe(0);
    expect(prompter.questions).toEqual([`Purge the Pyve environment in ${root}? [y/n]: `]);
    expect(reporter.stdout()).toEqual(['Purge cancelled.']);
    expect(existsSync(join(root, '.venv'))).toBe(true);
    expect(existsSync(join(root, '.pyve', 'config'))).toBe(true);
  });

  it('purges a named venv directory without a config', async () => {
    await makeVenv(root, 'my_venv');
    const { ctx, reporter } = makeProject(root, { answers: ['y'] });

    await purgeProject(ctx, { venvDirectory: 'my_venv' });
    expect(reporter.stdout()).toContain('✓ Removed my_venv');
    expect(existsSync(join(root, 'my_venv'))).toBe(false);
  });

  it('removes micromamba environments', async () => {
    await writeConfigText(root, 'pyve_version: "0.8.9"\nbackend: micromamba\nmicromamba:\n  env_name: demo-env\n');
    await mkdir(join(root, '.pyve', 'envs', 'demo-env', 'bin'), { recursive: true });
    const { ctx, reporter } = makeProject(root, { behavior: { autoYes: true } });

    await purgeProject(ctx);
    expect(reporter.stdout()).toContain('✓ Removed .pyve/envs/demo-env');
    expect(existsSync(join(root, '.pyve'))).toBe(false);
  });
});
