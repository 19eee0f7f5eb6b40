/**
 * JSON file reads.
 */

import { safeReadFile } from './atomic.js';
import { PyveError } from '../core/errors.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist. The result is unvalidated;
 * callers run it through a schema.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new PyveError('FILE_ERROR', `Invalid JSON in: ${filePath}`, { cause: err });
  }
}
