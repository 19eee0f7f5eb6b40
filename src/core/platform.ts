/**
 * Platform compatibility layer.
 *
 * Detects the runtime platform and provides tool detection and the
 * per-platform layout of a virtual environment.
 */

import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Detected platform. */
export type Platform = 'linux' | 'macos' | 'windows' | 'unknown';

/** Detect the current platform. */
export function detectPlatform(): Platform {
  switch (process.platform) {
    case 'linux': return 'linux';
    case 'darwin': return 'macos';
    case 'win32': return 'windows';
    default: return 'unknown';
  }
}

/** Cached platform value. */
export const PLATFORM: Platform = detectPlatform();

/**
 * Check if a command exists on PATH.
 * Absolute paths are checked directly.
 */
export async function commandExists(command: string): Promise<boolean> {
  if (isAbsolute(command)) return existsSync(command);
  try {
    await execFileAsync(PLATFORM === 'windows' ? 'where' : 'which', [command]);
    return true;
  } catch {
    return false;
  }
}

/** Directory holding a virtual environment's executables. */
export function venvBinDir(venvPath: string, platform: Platform = PLATFORM): string {
  return join(venvPath, platform === 'windows' ? 'Scripts' : 'bin');
}

/** Python interpreter inside a virtual environment. */
export function venvPython(venvPath: string, platform: Platform = PLATFORM): string {
  return join(venvBinDir(venvPath, platform), platform === 'windows' ? 'python.exe' : 'python');
}

/** Minimum required Node.js major version. */
export const MINIMUM_NODE_MAJOR = 20;

/** Get Node.js version info. */
export function getNodeVersionInfo(): {
  version: string;
  major: number;
  meetsMinimum: boolean;
} {
  const version = process.version.replace('v', '');
  const [major = 0] = version.split('.').map(Number);

  return {
    version,
    major,
    meetsMinimum: major >= MINIMUM_NODE_MAJOR,
  };
}
