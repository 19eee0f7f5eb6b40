/**
 * Type definitions for tool settings and the per-project config record.
 */

/** Environment technology a project uses. */
export type Backend = 'venv' | 'micromamba';

export const BACKENDS: readonly Backend[] = ['venv', 'micromamba'];

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the pyve home directory (default: 'logs/pyve.log') */
  filePath: string;
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to keep (default: 5) */
  maxFiles: number;
}

/** Switches that change how prompts behave. */
export interface BehaviorConfig {
  /** Answer yes to every confirmation (PYVE_FORCE_YES). */
  autoYes: boolean;
  /** Running under CI: interactive menus are skipped. */
  ci: boolean;
  /** Skip the recorded-version comparison. */
  skipVersionCheck: boolean;
}

/** External executables. */
export interface ToolsConfig {
  python: string;
  /** Explicit micromamba binary; null means look it up on PATH. */
  micromamba: string | null;
}

export interface DefaultsConfig {
  venvDirectory: string;
}

/** Resolved tool settings for one invocation. */
export interface PyveSettings {
  defaults: DefaultsConfig;
  behavior: BehaviorConfig;
  tools: ToolsConfig;
  logging: LoggingConfig;
}

/** Where a resolved setting came from. */
export type SettingsSource = 'default' | 'global' | 'env';

/**
 * Persisted per-project record (.pyve/config).
 * `version` is absent for legacy projects written before version tracking.
 */
export interface ProjectConfig {
  backend: Backend;
  version?: string;
  venvDirectory?: string;
  pythonVersion?: string;
  environmentName?: string;
}
