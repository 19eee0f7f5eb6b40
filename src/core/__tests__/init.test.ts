import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile, stat, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { initializeProject, type InitOptions } from '../init.js';
import { getConfigPath } from '../paths.js';
import { venvPython } from '../platform.js';
import { FakeRunner, makeProject, makeTempProject, removeTempProject } from './fixtures/project.js';

let root: string;

beforeEach(async () => {
  root = await makeTempProject();
});

afterEach(async () => {
  await removeTempProject(root);
});

function venvOptions(overrides: Partial<InitOptions> = {}): InitOptions {
  return { backend: 'venv', direnv: false, ...overrides };
}

describe('initializeProject (venv)', () => {
  it('rejects an invalid directory name before touching the disk', async () => {
    const { ctx, runner } = makeProject(root);
    await expect(initializeProject(ctx, venvOptions({ venvDirectory: 'my venv' }))).rejects.toThrow(
      "Invalid directory name 'my venv'. Use only alphanumeric characters, dots, underscores, and hyphens.",
    );
    await expect(initializeProject(ctx, venvOptions({ venvDirectory: '.git' }))).rejects.toThrow(
      "Directory name '.git' is reserved and cannot be used.",
    );
    expect(runner.calls).toEqual([]);
    expect(existsSync(join(root, '.pyve'))).toBe(false);
  });

  it('rejects a malformed Python version', async () => {
    const { ctx } = makeProject(root);
    await expect(initializeProject(ctx, venvOptions({ pythonVersion: '3.12' }))).rejects.toMatchObject({
      kind: 'INVALID_INPUT',
      message: "Invalid Python version format '3.12'. Expected format: #.#.# (e.g., 3.13.7)",
    });
  });

  it('installs requirements.txt into the new environment', async () => {
    await writeFile(join(root, 'requirements.txt'), 'requests==2.31.0\n');
    const { ctx, runner } = makeProject(root);

    await initializeProject(ctx, venvOptions());
    const venv = join(root, '.venv');
    expect(runner.commandLines()).toEqual([
      `python3 -m venv ${venv}`,
      `${venvPython(venv)} -m pip install -r requirements.txt`,
    ]);
  });

  it('writes no config when the environment cannot be created', async () => {
    const runner = new FakeRunner().respond((_cmd, args) => args[1] === 'venv', { code: 1, stderr: 'ensurepip failed\n' });
    const { ctx } = makeProject(root, { runner });

    await expect(initializeProject(ctx, venvOptions())).rejects.toMatchObject({
      kind: 'COMMAND_FAILED',
      message: "Failed to create virtual environment in '.venv': ensurepip failed",
    });
    expect(existsSync(getConfigPath(root))).toBe(false);
  });

  it('fails when no Python interpreter is available', async () => {
    const { ctx } = makeProject(root, { runner: new FakeRunner([]) });
    await expect(initializeProject(ctx, venvOptions())).rejects.toMatchObject({
      kind: 'TOOL_NOT_FOUND',
      message: 'Python interpreter not found: python3',
    });
  });

  it('leaves an existing .envrc alone and creates a private .env', async () => {
    await writeFile(join(root, '.envrc'), 'layout python\n');
    const { ctx, reporter } = makeProject(root);

    await initializeProject(ctx, venvOptions({ direnv: true }));
    expect(await readFile(join(root, '.envrc'), 'utf8')).toBe('layout python\n');
    expect(reporter.stdout()).toContain('INFO: direnv already configured (found .envrc). No change.');
    expect((await stat(join(root, '.env'))).mode & 0o777).toBe(0o600);
  });

  it('pins the requested Python version with asdf first', async () => {
    const runner = new FakeRunner(['python3', 'asdf'])
      .respond((cmd, args) => cmd === 'asdf' && args[0] === 'plugin', { stdout: 'nodejs\npython\n' })
      .respond((cmd, args) => cmd === 'asdf' && args[0] === 'list', { stdout: '  3.11.9\n *3.12.4\n' });
    const { ctx } = makeProject(root, { runner });

    const { config } = await initializeProject(ctx, venvOptions({ pythonVersion: '3.12.4' }));
    expect(config.pythonVersion).toBe('3.12.4');
    expect(runner.commandLines().slice(0, 4)).toEqual([
      'asdf plugin list',
      'asdf list python',
      'asdf set python 3.12.4',
      'asdf reshim python',
    ]);
    expect(await readFile(getConfigPath(root), 'utf8')).toBe(
      'pyve_version: "0.8.9"\nbackend: venv\nvenv:\n  directory: .venv\npython:\n  version: 3.12.4\n',
    );
  });
});

describe('initializeProject (micromamba)', () => {
  const micromamba = () => new FakeRunner(['python3', 'micromamba']);

  it('requires an environment file', async () => {
    const { ctx } = makeProject(root, { runner: micromamba() });
    await expect(initializeProject(ctx, { backend: 'micromamba', direnv: false })).rejects.toMatchObject({
      kind: 'MISSING_MANIFEST',
      message: 'No environment file found for micromamba backend',
    });
  });

  it('names the environment after the project directory', async () => {
    await writeFile(join(root, 'environment.yml'), 'channels:\n  - conda-forge\n');
    const { ctx, reporter } = makeProject(root, { runner: micromamba() });

    const { config, location } = await initializeProject(ctx, { backend: 'micromamba', direnv: false });
    expect(config.environmentName).toBe('my-project');
    expect(location.relativePath).toBe(join('.pyve', 'envs', 'my-project'));
    expect(reporter.stdout()).toContain('INFO: Using environment.yml without lock file.');
  });

  it('rejects a reserved environment name', async () => {
    await writeFile(join(root, 'environment.yml'), 'name: base\n');
    const { ctx } = makeProject(root, { runner: micromamba() });
    await expect(initializeProject(ctx, { backend: 'micromamba', direnv: false })).rejects.toThrow(
      "Environment name 'base' is reserved",
    );
  });

  it('ignores a Python version with a warning', async () => {
    await writeFile(join(root, 'environment.yml'), 'name: demo-env\n');
    const { ctx, reporter } = makeProject(root, { runner: micromamba() });

    const { config } = await initializeProject(ctx, { backend: 'micromamba', pythonVersion: '3.12.4', direnv: false });
    expect(config.pythonVersion).toBeUndefined();
    expect(reporter.stderr()).toEqual([
      'WARNING: --python-version is ignored for micromamba; the environment file decides the Python version',
    ]);
  });

  it('asks before building from a stale lock file', async () => {
    await writeFile(join(root, 'conda-lock.yml'), 'version: 1\n');
    await writeFile(join(root, 'environment.yml'), 'name: demo-env\n');
    const past = new Date(Date.now() - 60_000);
    await utimes(join(root, 'conda-lock.yml'), past, past);
    const runner = micromamba();
    const { ctx, prompter } = makeProject(root, { runner, answers: ['n'] });

    await expect(initializeProject(ctx, { backend: 'micromamba', direnv: false })).rejects.toThrow(
      'Aborted. Please update lock file and try again.',
    );
    expect(prompter.questions).toEqual(['Continue anyway? [y/n]: ']);
    expect(runner.calls).toEqual([]);
  });

  it('builds from the lock file when present', async () => {
    await writeFile(join(root, 'environment.yml'), 'name: demo-env\n');
    await writeFile(join(root, 'conda-lock.yml'), 'version: 1\n');
    const future = new Date(Date.now() + 60_000);
    await utimes(join(root, 'conda-lock.yml'), future, future);
    const runner = micromamba();
    const { ctx } = makeProject(root, { runner });

    await initializeProject(ctx, { backend: 'micromamba', direnv: false });
    expect(runner.commandLines()).toEqual([
      `micromamba create -p ${join(root, '.pyve', 'envs', 'demo-env')} -f conda-lock.yml -y`,
    ]);
  });
});
