/**
 * pino logging for pyve.
 *
 * One root logger per process, writing to a rotating file under the pyve
 * home directory (pino-roll). stdout and stderr belong to the Reporter;
 * only warnings and worse reach stderr, and only before initLogger has run.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

const upperCaseLevel = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/** Size string for pino-roll: '10m', '1g', '500k' or plain bytes. */
export function bytesToSizeString(bytes: number): string {
  const units: Array<[number, string]> = [[1024 ** 3, 'g'], [1024 ** 2, 'm'], [1024, 'k']];
  for (const [size, suffix] of units) {
    if (bytes >= size) return `${Math.floor(bytes / size)}${suffix}`;
  }
  return `${bytes}`;
}

/**
 * Start file logging at `<homeDir>/<config.filePath>`. Call once at startup;
 * throws when the log directory cannot be created.
 */
export function initLogger(homeDir: string, config: LoggingConfig): pino.Logger {
  const file = join(homeDir, config.filePath);
  mkdirSync(dirname(file), { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: { count: config.maxFiles, removeOtherLogFiles: true },
    },
  });

  rootLogger = pino(
    { level: config.level, formatters: upperCaseLevel, timestamp: pino.stdTimeFunctions.isoTime },
    transport,
  );
  return rootLogger;
}

/** Child logger for a subsystem ('reinit', 'backend', 'cli', ...). */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) return rootLogger.child({ subsystem });
  fallbackLogger ??= pino({ level: 'warn', formatters: upperCaseLevel }, pino.destination(2));
  return fallbackLogger.child({ subsystem });
}

/** Flush pending file writes and return to the stderr fallback. */
export function closeLogger(): void {
  rootLogger?.flush();
  rootLogger = null;
}
