/**
 * Shared fixtures for provisioning tests: temp directories, an in-process
 * command runner and a context wired to silent/memory sinks.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Prompter } from '../../scripts/lib/params.js';
import type { CommandRunner, ExecResult, RunOptions } from '../../scripts/lib/process.js';
import { rcFileFor, type ShellKind } from '../../scripts/lib/shell.js';
import { createMemoryLogger } from '../../scripts/provision/logger.js';
import type { ProvisionContext } from '../../scripts/provision/types.js';
import { createBufferedPrinter } from '../../scripts/utils.js';

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function ok(stdout = ''): ExecResult {
  return { ok: true, exitCode: 0, stdout, stderr: '' };
}

export function fail(stderr = '', exitCode = 1): ExecResult {
  return { ok: false, exitCode, stdout: '', stderr };
}

export type RecordedCall = { command: string; cwd?: string };

/**
 * CommandRunner that never spawns anything. `which` answers from `tools`;
 * commands are matched by their full text (`file arg1 arg2` for `cmd`) in
 * `responses`, falling back to a failed result.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly tools: Set<string>;
  readonly responses = new Map<string, ExecResult | (() => ExecResult)>();

  constructor(tools: readonly string[] = []) {
    this.tools = new Set(tools);
  }

  on(command: string, result: ExecResult | (() => ExecResult)): this {
    this.responses.set(command, result);
    return this;
  }

  commands(): string[] {
    return this.calls.map((c) => c.command);
  }

  private respond(command: string, opts: RunOptions): ExecResult {
    this.calls.push({ command, cwd: opts.cwd });
    const response = this.responses.get(command);
    if (response === undefined) return fail(`not stubbed: ${command}`, 127);
    return typeof response === 'function' ? response() : response;
  }

  async shell(command: string, opts: RunOptions = {}): Promise<ExecResult> {
    return this.respond(command, opts);
  }

  async cmd(file: string, args: string[] = [], opts: RunOptions = {}): Promise<ExecResult> {
    return this.respond([file, ...args].join(' '), opts);
  }

  async which(tool: string): Promise<boolean> {
    return this.tools.has(tool);
  }
}

/**
 * Prompter replaying `answers` in order; every question is recorded.
 */
export function scriptedPrompter(answers: string[] = []): Prompter & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    async ask(question) {
      questions.push(question);
      return answers.shift() ?? '';
    }
  };
}

export type TestContext = ProvisionContext & {
  exec: FakeCommandRunner;
  lines: string[];
  logger: ReturnType<typeof createMemoryLogger>;
};

export function makeContext(
  params: { projectRoot: string; homeDir: string; shell?: ShellKind } & Partial<
    Omit<ProvisionContext, 'exec' | 'logger' | 'printer'>
  > & { exec?: FakeCommandRunner }
): TestContext {
  const { printer, lines } = createBufferedPrinter();
  const shell = params.shell ?? 'bash';
  return {
    env: { HOME: params.homeDir, PATH: '/usr/bin:/bin', USER: 'tester' },
    rcFile: rcFileFor(shell, params.homeDir),
    params: {},
    prompter: scriptedPrompter(),
    autoYes: true,
    checkOnly: false,
    skip: [],
    ...params,
    shell,
    exec: params.exec ?? new FakeCommandRunner(),
    printer,
    lines,
    logger: createMemoryLogger()
  };
}
