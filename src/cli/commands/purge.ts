/**
 * pyve --purge [directory]: remove the project environment and config.
 */

import { purgeProject } from '../../core/purge.js';
import type { CliRuntime } from '../runtime.js';

export async function purgeAction(runtime: CliRuntime, purge: string | true): Promise<void> {
  const ctx = await runtime.context();
  runtime.exitCode = await purgeProject(ctx, {
    venvDirectory: typeof purge === 'string' ? purge : undefined,
  });
}
