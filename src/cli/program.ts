/**
 * Command-line surface of pyve.
 *
 * Modes are root flags (--init, --purge, --validate, --config,
 * --python-version); doctor, run and test are subcommands.
 */

import { Command, CommanderError } from 'commander';
import { PyveError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { formatError } from '../core/output.js';
import { ExitCode } from '../types/exit-codes.js';
import { configAction } from './commands/config.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { initAction } from './commands/init.js';
import { purgeAction } from './commands/purge.js';
import { pythonVersionAction } from './commands/python-version.js';
import { registerRunCommand } from './commands/run.js';
import { registerTestCommand } from './commands/test.js';
import { validateAction } from './commands/validate.js';
import { CliRuntime, type CliServices } from './runtime.js';

/** Root flags as commander hands them over. */
export interface RootOptions {
  init?: string | true;
  update?: boolean;
  force?: boolean;
  backend?: string;
  pythonVersion?: string;
  envName?: string;
  direnv: boolean;
  validate?: boolean;
  purge?: string | true;
  config?: boolean;
  json?: boolean;
}

function selectedModes(opts: RootOptions): string[] {
  const modes: string[] = [];
  if (opts.init !== undefined) modes.push('--init');
  if (opts.purge !== undefined) modes.push('--purge');
  if (opts.validate) modes.push('--validate');
  if (opts.config) modes.push('--config');
  return modes;
}

async function rootAction(program: Command, runtime: CliRuntime, opts: RootOptions): Promise<void> {
  const modes = selectedModes(opts);
  if (modes.length > 1) {
    throw new PyveError('INVALID_INPUT', `Options cannot be combined: ${modes.join(', ')}`);
  }
  if ((opts.update || opts.force) && opts.init === undefined) {
    throw new PyveError('INVALID_INPUT', `${opts.update ? '--update' : '--force'} requires --init`, {
      fix: `Use 'pyve --init ${opts.update ? '--update' : '--force'}'`,
    });
  }

  if (opts.init !== undefined) {
    await initAction(runtime, { ...opts, init: opts.init });
  } else if (opts.purge !== undefined) {
    await purgeAction(runtime, opts.purge);
  } else if (opts.validate) {
    await validateAction(runtime, { json: opts.json });
  } else if (opts.config) {
    await configAction(runtime, { json: opts.json });
  } else if (opts.pythonVersion !== undefined) {
    await pythonVersionAction(runtime, opts.pythonVersion);
  } else {
    runtime.write(program.helpInformation().trimEnd());
  }
}

export function createProgram(runtime: CliRuntime): Command {
  const { services } = runtime;
  const program = new Command();

  program
    .name('pyve')
    .description('Per-project Python environments (venv or micromamba)')
    .version(services.toolVersion, '-v, --version', 'Display the pyve version')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => { services.stdout.write(str); },
      writeErr: (str) => { services.stderr.write(str); },
    })
    .enablePositionalOptions()
    .option('-i, --init [directory]', 'Initialize the project (optional venv directory name)')
    .option('--update', 'With --init: update an existing installation in place')
    .option('--force', 'With --init: purge and re-initialize')
    .option('--backend <backend>', 'Backend: venv, micromamba or auto')
    .option('--python-version <version>', 'Python version to pin (#.#.#)')
    .option('--env-name <name>', 'Micromamba environment name')
    .option('--no-direnv', 'Skip .envrc and .env creation')
    .option('--validate', 'Validate the installation (exit 0 ok, 1 errors, 2 warnings)')
    .option('--purge [directory]', 'Remove the environment and pyve configuration')
    .option('-c, --config', 'Show resolved pyve settings')
    .option('--json', 'Output JSON (with --validate or --config)')
    .action(async (opts: RootOptions) => {
      await rootAction(program, runtime, opts);
    });

  registerDoctorCommand(program, runtime);
  registerRunCommand(program, runtime);
  registerTestCommand(program, runtime);

  return program;
}

/**
 * Parse `argv` (user arguments only) and run the selected action.
 * Resolves with the process exit code; never rejects for a PyveError.
 */
export async function runCli(argv: string[], services: CliServices): Promise<number> {
  const runtime = new CliRuntime(services);
  const program = createProgram(runtime);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return runtime.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    for (const line of formatError(err)) services.stderr.write(`${line}\n`);
    if (!(err instanceof PyveError)) {
      getLogger('cli').error({ err }, 'unexpected error');
      return ExitCode.FAILURE;
    }
    getLogger('cli').debug({ kind: err.kind }, 'command failed');
    return err.code;
  }
}
