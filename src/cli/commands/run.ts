/**
 * pyve run <command> [args...] - run a command inside the project environment.
 */

import type { Command } from 'commander';
import { runInEnvironment } from '../../core/run.js';
import type { CliRuntime } from '../runtime.js';

export function registerRunCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('run')
    .description('Run a command inside the project environment')
    .argument('<command>', 'Command to run')
    .argument('[args...]', 'Arguments passed to the command')
    .passThroughOptions()
    .allowUnknownOption()
    .action(async (command: string, args: string[]) => {
      const ctx = await runtime.context();
      runtime.exitCode = await runInEnvironment(ctx, command, args, runtime.services.env);
    });
}
