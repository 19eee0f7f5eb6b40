/**
 * Tool settings engine.
 *
 * Resolution priority: Environment vars > Global settings file > Defaults
 *
 * Settings are resolved once per invocation and handed to the core
 * explicitly; decision code never reads process.env itself.
 */

import { z } from 'zod';
import type { PyveSettings, SettingsSource } from '../types/config.js';
import { readJson } from '../store/json.js';
import { getGlobalSettingsPath } from './paths.js';
import { PyveError } from './errors.js';

/** Default settings values. */
export const DEFAULT_SETTINGS: PyveSettings = {
  defaults: {
    venvDirectory: '.venv',
  },
  behavior: {
    autoYes: false,
    ci: false,
    skipVersionCheck: false,
  },
  tools: {
    python: 'python3',
    micromamba: null,
  },
  logging: {
    level: 'info',
    filePath: 'logs/pyve.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const settingsSchema = z.object({
  defaults: z.object({
    venvDirectory: z.string().min(1),
  }),
  behavior: z.object({
    autoYes: z.boolean(),
    ci: z.boolean(),
    skipVersionCheck: z.boolean(),
  }),
  tools: z.object({
    python: z.string().min(1),
    micromamba: z.string().min(1).nullable(),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/** Accept 1/true/yes in any case. */
export function parseBooleanFlag(value: string): boolean {
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function parseString(value: string): string {
  return value;
}

/** Environment variable to settings path mapping. */
const ENV_MAP: Record<string, { path: string; parse: (value: string) => unknown }> = {
  'PYVE_FORCE_YES': { path: 'behavior.autoYes', parse: parseBooleanFlag },
  'CI': { path: 'behavior.ci', parse: parseBooleanFlag },
  'PYVE_SKIP_VERSION_CHECK': { path: 'behavior.skipVersionCheck', parse: parseBooleanFlag },
  'PYVE_PYTHON': { path: 'tools.python', parse: parseString },
  'PYVE_MICROMAMBA': { path: 'tools.micromamba', parse: parseString },
  'PYVE_DEFAULT_VENV_DIR': { path: 'defaults.venvDirectory', parse: parseString },
  'PYVE_LOG_LEVEL': { path: 'logging.level', parse: parseString },
  'PYVE_LOG_FILE': { path: 'logging.filePath', parse: parseString },
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: PlainObject, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: PlainObject, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

function cloneDefaults(): PlainObject {
  const copy: unknown = JSON.parse(JSON.stringify(DEFAULT_SETTINGS));
  return isPlainObject(copy) ? copy : {};
}

async function readGlobalSettings(env: NodeJS.ProcessEnv): Promise<PlainObject | null> {
  const path = getGlobalSettingsPath(env);
  const raw = await readJson(path);
  if (raw === null) return null;
  if (!isPlainObject(raw)) {
    throw new PyveError('CONFIG_CORRUPT', `Settings file must contain a JSON object: ${path}`);
  }
  return raw;
}

/**
 * Load and merge settings from all sources.
 * Priority: defaults < global settings file < environment vars
 */
export async function loadSettings(env: NodeJS.ProcessEnv = process.env): Promise<PyveSettings> {
  let merged = cloneDefaults();

  const global = await readGlobalSettings(env);
  if (global) {
    merged = deepMerge(merged, global);
  }

  for (const [envKey, { path, parse }] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined && envValue !== '') {
      setNestedValue(merged, path, parse(envValue));
    }
  }

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : 'settings';
    throw new PyveError('CONFIG_CORRUPT', `Invalid setting ${where}: ${issue?.message ?? 'unknown error'}`, {
      fix: `Check ${getGlobalSettingsPath(env)} and PYVE_* environment variables`,
    });
  }
  return result.data;
}

/** One resolved setting with the layer it came from. */
export interface ResolvedSetting {
  key: string;
  value: unknown;
  source: SettingsSource;
}

/**
 * Describe every leaf setting with source tracking.
 */
export async function describeSettings(env: NodeJS.ProcessEnv = process.env): Promise<ResolvedSetting[]> {
  const settings = await loadSettings(env);
  const global = await readGlobalSettings(env);
  const envPaths = new Set<string>();
  for (const [envKey, { path }] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined && envValue !== '') envPaths.add(path);
  }

  const resolved = settingsToObject(settings);
  const rows: ResolvedSetting[] = [];
  const defaults = cloneDefaults();
  for (const [section, values] of Object.entries(defaults)) {
    if (!isPlainObject(values)) continue;
    for (const name of Object.keys(values)) {
      const key = `${section}.${name}`;
      let source: SettingsSource = 'default';
      if (envPaths.has(key)) source = 'env';
      else if (global && getNestedValue(global, key) !== undefined) source = 'global';
      rows.push({ key, value: getNestedValue(resolved, key), source });
    }
  }
  return rows;
}

function settingsToObject(settings: PyveSettings): PlainObject {
  return {
    defaults: { ...settings.defaults },
    behavior: { ...settings.behavior },
    tools: { ...settings.tools },
    logging: { ...settings.logging },
  };
}
