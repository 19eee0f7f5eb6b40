/**
 * pyve test [args...] - run pytest from the reserved test environment.
 */

import type { Command } from 'commander';
import { runTests } from '../../core/testenv.js';
import type { CliRuntime } from '../runtime.js';

export function registerTestCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('test')
    .description('Run pytest in the dev/test environment (.pyve/testenv)')
    .argument('[args...]', 'Arguments passed to pytest')
    .passThroughOptions()
    .allowUnknownOption()
    .helpOption(false)
    .action(async (args: string[]) => {
      runtime.exitCode = await runTests(await runtime.context(), args, runtime.services.env);
    });
}
