/**
 * Subprocess execution.
 *
 * Everything pyve does to a Python toolchain goes through a CommandRunner
 * so tests can substitute an in-process fake.
 */

import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { ExitCode } from '../types/exit-codes.js';
import { commandExists } from './platform.js';
import { getLogger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Run to completion with captured output. Never rejects on a non-zero exit. */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
  /** Run attached to the terminal; resolves with the child's exit code. */
  launch(command: string, args: string[], options?: CommandOptions): Promise<number>;
  /** Whether an executable is on PATH (or an existing path). */
  exists(command: string): Promise<boolean>;
}

function readStringProp(err: Error, key: 'stdout' | 'stderr'): string {
  if (key in err) {
    const value: unknown = Reflect.get(err, key);
    if (typeof value === 'string') return value;
  }
  return '';
}

/** Map an execFile rejection to a CommandResult. */
export function execFailureToResult(err: unknown): CommandResult {
  if (!(err instanceof Error)) {
    return { code: ExitCode.FAILURE, stdout: '', stderr: String(err) };
  }
  const code: unknown = 'code' in err ? err.code : undefined;
  const stdout = readStringProp(err, 'stdout');
  const stderr = readStringProp(err, 'stderr') || err.message;
  if (code === 'ENOENT') return { code: ExitCode.COMMAND_NOT_FOUND, stdout, stderr };
  if (typeof code === 'number') return { code, stdout, stderr };
  return { code: ExitCode.FAILURE, stdout, stderr };
}

/** Runner backed by real child processes. */
export function createCommandRunner(): CommandRunner {
  const log = getLogger('exec');

  return {
    async run(command, args, options) {
      log.debug({ command, args, cwd: options?.cwd }, 'exec');
      try {
        const { stdout, stderr } = await execFileAsync(command, args, {
          cwd: options?.cwd,
          env: options?.env,
          encoding: 'utf8',
          maxBuffer: 10 * 1024 * 1024,
        });
        return { code: ExitCode.SUCCESS, stdout, stderr };
      } catch (err) {
        const result = execFailureToResult(err);
        log.debug({ command, code: result.code }, 'exec failed');
        return result;
      }
    },

    launch(command, args, options) {
      log.debug({ command, args, cwd: options?.cwd }, 'launch');
      return new Promise<number>((resolve) => {
        const child = spawn(command, args, {
          cwd: options?.cwd,
          env: options?.env,
          stdio: 'inherit',
        });
        child.on('error', (err) => {
          log.warn({ command, err }, 'launch failed');
          process.stderr.write(`ERROR: Cannot run '${command}': ${err.message}\n`);
          resolve(ExitCode.COMMAND_NOT_FOUND);
        });
        child.on('close', (code, signal) => {
          if (code !== null) resolve(code);
          // Killed by a signal: 128 + signal number, as a shell would report it
          else resolve(signal === 'SIGINT' ? 130 : signal === 'SIGTERM' ? 143 : ExitCode.FAILURE);
        });
      });
    },

    async exists(command) {
      return commandExists(command);
    },
  };
}
