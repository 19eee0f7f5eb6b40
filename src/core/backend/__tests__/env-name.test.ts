import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { makeTempProject, removeTempProject } from '../../__tests__/fixtures/project.js';
import {
  isReservedEnvironmentName,
  resolveEnvironmentName,
  sanitizeEnvironmentName,
  validateEnvironmentName,
} from '../env-name.js';

describe('sanitizeEnvironmentName', () => {
  it('lower-cases and replaces runs of other characters with one hyphen', () => {
    expect(sanitizeEnvironmentName('My Project!!')).toBe('my-project');
    expect(sanitizeEnvironmentName('data.science  tools')).toBe('data-science-tools');
  });

  it('keeps underscores and hyphens', () => {
    expect(sanitizeEnvironmentName('web_app-v2')).toBe('web_app-v2');
  });

  it('prefixes names that do not start with a letter or underscore', () => {
    expect(sanitizeEnvironmentName('2024-analysis')).toBe('env-2024-analysis');
    expect(sanitizeEnvironmentName('---')).toBe('env-');
  });

  it('caps the length', () => {
    expect(sanitizeEnvironmentName('a'.repeat(300))).toHaveLength(255);
  });

  it('returns an empty string for empty input', () => {
    expect(sanitizeEnvironmentName('')).toBe('');
  });
});

describe('validateEnvironmentName', () => {
  it('accepts ordinary names', () => {
    expect(() => validateEnvironmentName('my-project_2')).not.toThrow();
  });

  it('rejects reserved names', () => {
    for (const name of ['base', 'root', 'default', 'conda', 'mamba', 'micromamba']) {
      expect(isReservedEnvironmentName(name)).toBe(true);
      expect(() => validateEnvironmentName(name)).toThrow(`Environment name '${name}' is reserved`);
    }
  });

  it('rejects invalid characters and leading digits', () => {
    expect(() => validateEnvironmentName('my env')).toThrow('Invalid environment name: my env');
    expect(() => validateEnvironmentName('1env')).toThrow('Environment name must start with letter or underscore: 1env');
    expect(() => validateEnvironmentName('')).toThrow('Environment name cannot be empty');
  });
});

describe('resolveEnvironmentName', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempProject();
  });

  afterEach(async () => {
    await removeTempProject(root);
  });

  it('prefers an explicit name, then the config', async () => {
    await writeFile(join(root, 'environment.yml'), 'name: from-file\n');
    expect(await resolveEnvironmentName(root, 'explicit', 'configured')).toBe('explicit');
    expect(await resolveEnvironmentName(root, undefined, 'configured')).toBe('configured');
  });

  it('falls back to environment.yml, then the directory name', async () => {
    expect(await resolveEnvironmentName(root)).toBe('my-project');
    await writeFile(join(root, 'environment.yml'), 'name: from-file\ndependencies:\n  - python\n');
    expect(await resolveEnvironmentName(root)).toBe('from-file');
  });
});
