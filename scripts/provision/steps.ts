/**
 * Probe/remedy building blocks shared by the recipes.
 */

import path from 'node:path';

import type { ExecResult, RunOptions } from '../lib/process.js';
import {
  ensureBlock,
  fileIncludes,
  isDirectory,
  isExecutable,
  isFile,
  readTextIfExists,
  writeFileIfChanged
} from '../lib/text-file.js';
import type { ProbeResult, ProvisionContext, RemedyResult, Step, StepSeverity } from './types.js';

export function passed(detail?: string): ProbeResult {
  return detail === undefined ? { ok: true } : { ok: true, detail };
}

export function missing(detail: string): ProbeResult {
  return { ok: false, detail };
}

export function fromExec(res: ExecResult): RemedyResult {
  if (res.ok) return { ok: true };
  return { ok: false, error: res.stderr || res.stdout || `exit code ${res.exitCode}` };
}

export function shellRemedy(
  command: string | ((ctx: ProvisionContext) => string),
  opts: RunOptions = {}
): (ctx: ProvisionContext) => Promise<RemedyResult> {
  return async (ctx) => {
    const resolved = typeof command === 'string' ? command : command(ctx);
    return fromExec(await ctx.exec.shell(resolved, { cwd: ctx.projectRoot, ...opts }));
  };
}

export function aptInstallCommand(packages: readonly string[]): string {
  return `sudo apt-get update && sudo apt-get install -y ${packages.join(' ')}`;
}

export async function probeTool(ctx: ProvisionContext, tool: string): Promise<ProbeResult> {
  return (await ctx.exec.which(tool)) ? passed(`${tool} found`) : missing(`${tool} not found in PATH`);
}

export function probeFile(filePath: string, label = path.basename(filePath)): ProbeResult {
  return isFile(filePath) ? passed(`${label} exists`) : missing(`${label} not found`);
}

export function probeDirectory(dirPath: string, label = dirPath): ProbeResult {
  return isDirectory(dirPath) ? passed(`${label} exists`) : missing(`${label} not found`);
}

export function probeEnvVar(ctx: ProvisionContext, name: string): ProbeResult {
  const value = ctx.env[name];
  if (value === undefined || value.trim() === '') return missing(`${name} is not set`);
  return passed(`${name}=${value}`);
}

/**
 * "Tool is on PATH", fixed by an optional install command.
 */
export function toolStep(params: {
  id: string;
  tool: string;
  title?: string;
  install?: string;
  /** Run the install command attached to the terminal (password prompts). */
  interactive?: boolean;
  severity?: StepSeverity;
  dependsOn?: readonly string[];
}): Step {
  const { id, tool, install } = params;
  return {
    id,
    title: params.title ?? `${tool} available`,
    severity: params.severity,
    dependsOn: params.dependsOn,
    probe: (ctx) => probeTool(ctx, tool),
    ...(install ? { remedy: shellRemedy(install, { interactive: params.interactive === true }) } : {})
  };
}

/**
 * "Line block is present in a file", probed by `marker` and fixed by appending.
 */
export function blockStep(params: {
  id: string;
  title: string;
  file: (ctx: ProvisionContext) => string;
  marker: (ctx: ProvisionContext) => string;
  lines: (ctx: ProvisionContext) => string[];
  severity?: StepSeverity;
  dependsOn?: readonly string[];
}): Step {
  return {
    id: params.id,
    title: params.title,
    severity: params.severity,
    dependsOn: params.dependsOn,
    async probe(ctx) {
      const file = params.file(ctx);
      return fileIncludes(file, params.marker(ctx))
        ? passed(`present in ${file}`)
        : missing(`not present in ${file}`);
    },
    async remedy(ctx) {
      ensureBlock(params.file(ctx), params.lines(ctx), { marker: params.marker(ctx) });
      return { ok: true };
    }
  };
}

/**
 * "File has exactly this content" (and is executable when `executable` is set),
 * fixed by writing it.
 */
export function fileContentStep(params: {
  id: string;
  title: string;
  file: (ctx: ProvisionContext) => string;
  content: string;
  executable?: boolean;
  severity?: StepSeverity;
  dependsOn?: readonly string[];
}): Step {
  return {
    id: params.id,
    title: params.title,
    severity: params.severity,
    dependsOn: params.dependsOn,
    confirm: false,
    async probe(ctx) {
      const file = params.file(ctx);
      const rel = path.relative(ctx.projectRoot, file) || file;
      const current = readTextIfExists(file);
      if (current === null) return missing(`${rel} not found`);
      if (current !== params.content) return missing(`${rel} differs`);
      if (params.executable && !isExecutable(file)) return missing(`${rel} is not executable`);
      return passed(`${rel} up to date`);
    },
    async remedy(ctx) {
      writeFileIfChanged(params.file(ctx), params.content, params.executable ? { mode: 0o755 } : {});
      return { ok: true };
    }
  };
}
