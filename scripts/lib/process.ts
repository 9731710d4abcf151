import { execa, type Options as ExecaOptions } from 'execa';

import { requiresSudo } from '../utils.js';

export type ExecOptions = ExecaOptions<string>;

export type ExecResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  /**
   * Attach the terminal (stdin/stdout/stderr) so the command can ask for a
   * password. Output is not captured. Commands starting with `sudo ` are
   * always run this way.
   */
  interactive?: boolean;
};

/**
 * Everything a step needs to touch the outside world through processes.
 * Tests replace it with an in-process fake.
 */
export interface CommandRunner {
  shell(command: string, opts?: RunOptions): Promise<ExecResult>;
  cmd(file: string, args?: string[], opts?: RunOptions): Promise<ExecResult>;
  which(tool: string): Promise<boolean>;
}

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

function toResult(res: { exitCode?: number; stdout?: unknown; stderr?: unknown }): ExecResult {
  return {
    ok: (res.exitCode ?? 1) === 0,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr)
  };
}

export async function execCmd(
  file: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const res = await execa(file, args, {
    encoding: 'utf8',
    reject: false,
    ...options
  });
  return toResult(res);
}

export async function execShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
  const res = await execa(command, {
    encoding: 'utf8',
    reject: false,
    shell: '/bin/bash',
    ...options
  });
  return toResult(res);
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:@=-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Default runner backed by execa. `env` is read on every call, so a caller
 * may hand in a prepared environment (for example with `~/.local/bin` on PATH).
 */
export function createCommandRunner(params: {
  env: NodeJS.ProcessEnv;
  cwd: string;
  log?: (message: string) => void;
}): CommandRunner {
  const { env, cwd, log } = params;

  const optionsFor = (opts: RunOptions, interactive: boolean): ExecOptions => ({
    cwd: opts.cwd ?? cwd,
    env,
    extendEnv: false,
    stdio: interactive ? 'inherit' : 'pipe'
  });

  return {
    async shell(command, opts = {}) {
      const interactive = opts.interactive === true || requiresSudo(command);
      log?.(`exec: ${command}`);
      const res = await execShell(command, optionsFor(opts, interactive));
      log?.(`exec.done: ${command} (exit ${res.exitCode})`);
      return res;
    },
    async cmd(file, args = [], opts = {}) {
      const interactive = opts.interactive === true || file === 'sudo';
      const printable = [file, ...args.map(shellQuote)].join(' ');
      log?.(`exec: ${printable}`);
      const res = await execCmd(file, args, optionsFor(opts, interactive));
      log?.(`exec.done: ${printable} (exit ${res.exitCode})`);
      return res;
    },
    async which(tool) {
      const res = await execShell(`command -v ${shellQuote(tool)}`, optionsFor({}, false));
      return res.ok && res.stdout.length > 0;
    }
  };
}
