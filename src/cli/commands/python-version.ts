/**
 * pyve --python-version <version> (without --init): pin the local Python.
 */

import { pinPythonVersion } from '../../core/python-version.js';
import type { CliRuntime } from '../runtime.js';

export async function pythonVersionAction(runtime: CliRuntime, version: string): Promise<void> {
  await pinPythonVersion(await runtime.context(), version);
}
