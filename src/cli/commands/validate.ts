/**
 * pyve --validate: read-only project validation.
 */

import { validateProject } from '../../core/validation/validate.js';
import { renderValidation } from '../renderers/validation.js';
import type { CliRuntime } from '../runtime.js';

export async function validateAction(runtime: CliRuntime, options: { json?: boolean }): Promise<void> {
  const ctx = await runtime.context();
  const report = await validateProject(ctx.root, { toolVersion: ctx.toolVersion, settings: ctx.settings });

  if (options.json) {
    runtime.writeJson(report);
  } else {
    runtime.write(renderValidation(report, { color: runtime.services.color }));
  }
  runtime.exitCode = report.exitCode;
}
