#!/usr/bin/env node
/**
 * pyve CLI entry point.
 */

import { createCommandRunner } from '../core/exec.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { formatError } from '../core/output.js';
import { getPyveHome } from '../core/paths.js';
import { getNodeVersionInfo, MINIMUM_NODE_MAJOR } from '../core/platform.js';
import { loadSettings } from '../core/settings.js';
import { getPackageVersion } from '../core/version.js';
import type { PyveSettings } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { runCli } from './program.js';
import { createReadlinePrompter } from './prompt.js';
import { shouldUseColor } from './renderers/colors.js';

async function main(): Promise<number> {
  // Startup guard: fail fast if Node.js version is below minimum
  const nodeInfo = getNodeVersionInfo();
  if (!nodeInfo.meetsMinimum) {
    process.stderr.write(`ERROR: pyve requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${nodeInfo.version}\n`);
    return ExitCode.FAILURE;
  }

  let settings: PyveSettings;
  try {
    settings = await loadSettings(process.env);
  } catch (err) {
    for (const line of formatError(err)) process.stderr.write(`${line}\n`);
    return ExitCode.FAILURE;
  }

  try {
    initLogger(getPyveHome(process.env), settings.logging);
  } catch (err) {
    // Without a log file the stderr fallback logger stays in place
    getLogger('cli').warn({ err }, 'file logging unavailable');
  }

  const prompter = createReadlinePrompter();
  try {
    return await runCli(process.argv.slice(2), {
      cwd: process.cwd(),
      env: process.env,
      stdout: process.stdout,
      stderr: process.stderr,
      runner: createCommandRunner(),
      prompter,
      toolVersion: getPackageVersion(),
      color: shouldUseColor(),
      settings,
    });
  } finally {
    prompter.close();
    closeLogger();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`ERROR: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = ExitCode.FAILURE;
  },
);
