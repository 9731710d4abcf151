/**
 * Steps shared by several recipes (direnv, Poetry, pre-commit).
 */

import fs from 'node:fs';
import path from 'node:path';

import { SHELL_PROFILES, shellForRcFile, type ShellKind } from '../../lib/shell.js';
import { appendBlock, fileIncludes, isDirectory, isFile } from '../../lib/text-file.js';
import { aptInstallCommand, fromExec, missing, passed, probeTool, toolStep } from '../steps.js';
import type { ProvisionContext, Step, StepSeverity } from '../types.js';
import { POETRY_INSTALL_COMMAND } from './packages.js';

export const DIRENV_HOOK_COMMENT = '# Enable direnv shell integration';

/**
 * `direnv status` prints `Found RC allowed true` on older releases and
 * `Found RC allowed 0` on newer ones (0 = allowed).
 */
export function isEnvrcAllowed(statusOutput: string): boolean {
  const match = statusOutput.match(/^Found RC allowed (\S+)/m);
  if (!match) return false;
  return match[1] === 'true' || match[1] === '0';
}

export function direnvToolStep(): Step {
  return toolStep({ id: 'direnv', tool: 'direnv', install: aptInstallCommand(['direnv']) });
}

export function poetryToolStep(dependsOn?: readonly string[]): Step {
  return toolStep({ id: 'poetry', tool: 'poetry', install: POETRY_INSTALL_COMMAND, dependsOn });
}

/**
 * direnv hook in an RC file. `rcFile` defaults to the context's RC file; the
 * hook line is taken from the shell owning that file.
 */
export function direnvHookStep(params: {
  id: string;
  title: string;
  rcFile?: (ctx: ProvisionContext) => string;
  /** Treat a missing RC file as nothing to do instead of creating it. */
  onlyIfExists?: boolean;
}): Step {
  const rcFileOf = (ctx: ProvisionContext): string => (params.rcFile ? params.rcFile(ctx) : ctx.rcFile);
  const shellOf = (ctx: ProvisionContext, rcFile: string): ShellKind =>
    params.rcFile ? (shellForRcFile(rcFile) ?? 'posix') : ctx.shell;

  return {
    id: params.id,
    title: params.title,
    async probe(ctx) {
      const rcFile = rcFileOf(ctx);
      if (params.onlyIfExists && !isFile(rcFile)) return passed(`${rcFile} absent`);
      if (fileIncludes(rcFile, 'direnv hook')) return passed(`hook present in ${rcFile}`);
      return missing(`no direnv hook in ${rcFile}`);
    },
    async remedy(ctx) {
      const rcFile = rcFileOf(ctx);
      const shell = shellOf(ctx, rcFile);
      const hook = SHELL_PROFILES[shell].direnvHook;
      if (!hook) return { ok: false, error: `direnv has no hook for ${shell} shells; pass --shell` };
      appendBlock(rcFile, [DIRENV_HOOK_COMMENT, hook]);
      return { ok: true };
    }
  };
}

/**
 * `.envrc` containing `line`. `overwrite` replaces a file with other content
 * (poetry-setup); otherwise any existing `.envrc` counts as present.
 */
export function envrcStep(line: string, opts: { overwrite: boolean }): Step {
  return {
    id: 'envrc',
    title: '.envrc present',
    confirm: false,
    async probe(ctx) {
      const envrc = path.join(ctx.projectRoot, '.envrc');
      if (!isFile(envrc)) return missing('.envrc not found');
      if (opts.overwrite && !fileIncludes(envrc, line)) return missing(`.envrc does not contain: ${line}`);
      return passed('.envrc exists');
    },
    async remedy(ctx) {
      fs.writeFileSync(path.join(ctx.projectRoot, '.envrc'), `${line}\n`, 'utf8');
      return { ok: true };
    }
  };
}

export function direnvAllowStep(): Step {
  return {
    id: 'direnv-allow',
    title: '.envrc allowed by direnv',
    dependsOn: ['direnv', 'envrc'],
    confirm: false,
    async probe(ctx) {
      const res = await ctx.exec.cmd('direnv', ['status'], { cwd: ctx.projectRoot });
      return isEnvrcAllowed(res.stdout) ? passed('allowed') : missing('.envrc is not allowed');
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('direnv', ['allow'], { cwd: ctx.projectRoot }));
    }
  };
}

/**
 * One step per dev tool: present in the Poetry env, else `poetry add --group dev`.
 */
export function devToolSteps(tools: readonly string[], dependsOn: readonly string[]): Step[] {
  return tools.map((tool): Step => ({
    id: `dev-tool-${tool}`,
    title: `${tool} in Poetry env`,
    dependsOn,
    async probe(ctx) {
      const res = await ctx.exec.cmd('poetry', ['run', 'which', tool], { cwd: ctx.projectRoot });
      return res.ok ? passed(res.stdout) : missing(`${tool} not installed in Poetry env`);
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('poetry', ['add', '--group', 'dev', tool], { cwd: ctx.projectRoot }));
    }
  }));
}

/**
 * In-project virtualenv and lock file exist, else `poetry install`.
 * Without `pyproject.toml` there is nothing to install when `allowNoProject` is set.
 */
export function poetryInstallStep(params: {
  args: readonly string[];
  dependsOn: readonly string[];
  allowNoProject?: boolean;
}): Step {
  return {
    id: 'poetry-install',
    title: 'Poetry dependencies installed',
    dependsOn: params.dependsOn,
    async probe(ctx) {
      if (params.allowNoProject && !isFile(path.join(ctx.projectRoot, 'pyproject.toml'))) {
        return passed('no pyproject.toml, nothing to install');
      }
      if (!isFile(path.join(ctx.projectRoot, 'poetry.lock'))) return missing('poetry.lock not found');
      if (!isDirectory(path.join(ctx.projectRoot, '.venv'))) return missing('.venv not found');
      return passed('.venv and poetry.lock present');
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('poetry', ['install', ...params.args], { cwd: ctx.projectRoot }));
    }
  };
}

export function precommitHookInstalled(ctx: ProvisionContext): boolean {
  return fileIncludes(path.join(ctx.projectRoot, '.git', 'hooks', 'pre-commit'), 'pre-commit');
}

export function precommitHookStep(params: {
  command: readonly string[];
  dependsOn: readonly string[];
  severity?: StepSeverity;
}): Step {
  const [file, ...args] = params.command;
  return {
    id: 'precommit-hook',
    title: 'pre-commit git hook installed',
    dependsOn: params.dependsOn,
    severity: params.severity,
    confirm: false,
    async probe(ctx) {
      return precommitHookInstalled(ctx) ? passed('hook installed') : missing('.git/hooks/pre-commit not installed');
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd(file, args, { cwd: ctx.projectRoot }));
    }
  };
}

/**
 * Hooks pass on every file. There is no automatic fix: hooks that rewrite
 * files already did so, and the rest needs a human.
 */
export function precommitRunStep(params: { dependsOn?: readonly string[]; severity?: StepSeverity }): Step {
  return {
    id: 'precommit-run',
    title: 'pre-commit hooks pass on all files',
    dependsOn: params.dependsOn,
    severity: params.severity,
    async probe(ctx) {
      const tool = await probeTool(ctx, 'pre-commit');
      if (!tool.ok) return tool;
      const res = await ctx.exec.cmd('pre-commit', ['run', '--all-files'], { cwd: ctx.projectRoot });
      if (res.ok) return passed('all hooks passed');
      const lastLine = (res.stdout || res.stderr).split('\n').filter((l) => l.trim()).pop();
      return missing(lastLine ? `some hooks failed (${lastLine.trim()})` : 'some hooks failed');
    }
  };
}
