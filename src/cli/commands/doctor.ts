/**
 * pyve doctor - environment diagnostics.
 */

import type { Command } from 'commander';
import { NOT_INITIALIZED_MESSAGE, runDoctor } from '../../core/doctor.js';
import { renderDoctor } from '../renderers/doctor.js';
import type { CliRuntime } from '../runtime.js';

export function registerDoctorCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('doctor')
    .description('Check environment health')
    .option('--json', 'Output the diagnostics as JSON')
    .action(async (opts: { json?: boolean }) => {
      const report = await runDoctor(await runtime.context());
      if (opts.json) {
        runtime.writeJson(report);
      } else if (!report.initialized) {
        runtime.write(NOT_INITIALIZED_MESSAGE);
      } else {
        runtime.write(renderDoctor(report, { color: runtime.services.color }));
      }
      runtime.exitCode = report.exitCode;
    });
}
