/**
 * Atomic file write operations using write-file-atomic.
 * Writes are crash-safe: temp file -> rename. The project config is only
 * ever replaced whole through these helpers.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PyveError, isErrnoException } from '../core/errors.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new PyveError('FILE_ERROR', `Atomic write failed: ${filePath}`, { cause: err });
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    throw new PyveError('FILE_ERROR', `Failed to read: ${filePath}`, { cause: err });
  }
}
