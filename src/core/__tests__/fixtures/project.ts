/**
 * In-process stand-ins for the toolchain, stdin and the console, plus
 * helpers for building throwaway projects.
 */

import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, isAbsolute, join } from 'node:path';
import type { BehaviorConfig, PyveSettings } from '../../../types/config.js';
import type { ProjectContext } from '../../context.js';
import type { CommandOptions, CommandResult, CommandRunner } from '../../exec.js';
import { formatErrorLine, formatInfo, formatSuccess, formatWarning, type Reporter } from '../../output.js';
import { getConfigPath } from '../../paths.js';
import { venvPython } from '../../platform.js';
import type { Prompter } from '../../prompt.js';
import { DEFAULT_SETTINGS } from '../../settings.js';

export const TOOL_VERSION = '0.8.9';

// ============================================================================
// Command runner
// ============================================================================

export interface RecordedCall {
  mode: 'run' | 'launch';
  command: string;
  args: string[];
  options?: CommandOptions;
}

type Responder = (command: string, args: string[]) => CommandResult | undefined;

const OK: CommandResult = { code: 0, stdout: '', stderr: '' };

/**
 * Fake toolchain. `python -m venv <dir>` and `micromamba create -p <dir>`
 * create the directory (the venv with an interpreter stub) so later steps
 * see a real environment on disk. Everything else succeeds silently
 * unless a responder says otherwise.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly available: Set<string>;
  launchCode = 0;
  private readonly responders: Responder[] = [];

  constructor(available: string[] = ['python3']) {
    this.available = new Set(available);
  }

  /** Answer matching calls with `result`. Later registrations win. */
  respond(match: (command: string, args: string[]) => boolean, result: Partial<CommandResult>): this {
    this.responders.unshift((command, args) => (match(command, args) ? { ...OK, ...result } : undefined));
    return this;
  }

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ mode: 'run', command, args, options });
    for (const responder of this.responders) {
      const result = responder(command, args);
      if (result) return result;
    }

    const target = args[2];
    if (args[0] === '-m' && args[1] === 'venv' && target !== undefined) {
      const python = venvPython(target);
      await mkdir(dirname(python), { recursive: true });
      await writeFile(python, '');
      return OK;
    }
    if (args[0] === 'create' && args[1] === '-p' && target !== undefined) {
      await mkdir(join(target, 'bin'), { recursive: true });
      return OK;
    }
    return OK;
  }

  async launch(command: string, args: string[], options?: CommandOptions): Promise<number> {
    this.calls.push({ mode: 'launch', command, args, options });
    return this.launchCode;
  }

  async exists(command: string): Promise<boolean> {
    if (isAbsolute(command)) return existsSync(command);
    return this.available.has(command);
  }

  /** "command arg1 arg2" for every recorded call. */
  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(' '));
  }
}

// ============================================================================
// Prompter and reporter
// ============================================================================

/** Answers questions from a fixed script; null once the script runs out. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[] = []) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }
}

export interface RecordedLine {
  stream: 'stdout' | 'stderr';
  text: string;
}

/** Records every line with the stream it would have gone to. */
export class RecordingReporter implements Reporter {
  readonly lines: RecordedLine[] = [];

  print(line: string): void {
    this.lines.push({ stream: 'stdout', text: line });
  }
  info(message: string): void {
    this.lines.push({ stream: 'stdout', text: formatInfo(message) });
  }
  success(message: string): void {
    this.lines.push({ stream: 'stdout', text: formatSuccess(message) });
  }
  warn(message: string): void {
    this.lines.push({ stream: 'stderr', text: formatWarning(message) });
  }
  error(message: string): void {
    this.lines.push({ stream: 'stderr', text: formatErrorLine(message) });
  }

  stdout(): string[] {
    return this.lines.filter((l) => l.stream === 'stdout').map((l) => l.text);
  }
  stderr(): string[] {
    return this.lines.filter((l) => l.stream === 'stderr').map((l) => l.text);
  }
}

// ============================================================================
// Projects
// ============================================================================

export function makeSettings(behavior: Partial<BehaviorConfig> = {}): PyveSettings {
  return {
    defaults: { ...DEFAULT_SETTINGS.defaults },
    behavior: { ...DEFAULT_SETTINGS.behavior, ...behavior },
    tools: { ...DEFAULT_SETTINGS.tools },
    logging: { ...DEFAULT_SETTINGS.logging },
  };
}

export interface TestProject {
  ctx: ProjectContext;
  runner: FakeRunner;
  prompter: ScriptedPrompter;
  reporter: RecordingReporter;
}

export interface TestProjectOptions {
  behavior?: Partial<BehaviorConfig>;
  answers?: string[];
  runner?: FakeRunner;
  toolVersion?: string;
}

/** Context for a project rooted at `root`, with pyve home beside it. */
export function makeProject(root: string, options: TestProjectOptions = {}): TestProject {
  const runner = options.runner ?? new FakeRunner();
  const prompter = new ScriptedPrompter(options.answers);
  const reporter = new RecordingReporter();
  const ctx: ProjectContext = {
    root,
    home: join(root, '..', 'pyve-home'),
    toolVersion: options.toolVersion ?? TOOL_VERSION,
    settings: makeSettings(options.behavior),
    runner,
    reporter,
    prompter,
  };
  return { ctx, runner, prompter, reporter };
}

/**
 * Fresh temp directory holding an empty `my-project` directory.
 * Returns the project root; remove `join(root, '..')` afterwards.
 */
export async function makeTempProject(): Promise<string> {
  const base = await mkdtemp(join(tmpdir(), 'pyve-test-'));
  const root = join(base, 'my-project');
  await mkdir(root);
  return root;
}

export async function removeTempProject(root: string): Promise<void> {
  await rm(join(root, '..'), { recursive: true, force: true });
}

/** Write raw .pyve/config text. */
export async function writeConfigText(root: string, text: string): Promise<void> {
  await mkdir(join(root, '.pyve'), { recursive: true });
  await writeFile(getConfigPath(root), text);
}

/** Create a venv directory with an interpreter stub. */
export async function makeVenv(root: string, directory = '.venv'): Promise<string> {
  const python = venvPython(join(root, directory));
  await mkdir(dirname(python), { recursive: true });
  await writeFile(python, '');
  return join(root, directory);
}
