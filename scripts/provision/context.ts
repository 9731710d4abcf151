import path from 'node:path';

import { getHomeDir, readEnvFile, withPathEntry } from '../lib/env.js';
import {
  envSource,
  promptSource,
  staticSource,
  type ParamSource,
  type Params,
  type Prompter
} from '../lib/params.js';
import { createCommandRunner, type CommandRunner } from '../lib/process.js';
import { detectShell, rcFileFor, type ShellKind } from '../lib/shell.js';
import type { DevkitConfig } from '../schemas/devkit-config.zod.js';
import { print, type Printer } from '../utils.js';
import type { ProvisionLogger } from './logger.js';
import type { ProvisionContext } from './types.js';

/**
 * Parameter lookup order: flags, `DEVKIT_*` process env, `.env` in the
 * project root, `params` in the config file, then the prompt (when given).
 */
export function buildParamSources(params: {
  flags: Params;
  env: NodeJS.ProcessEnv;
  projectRoot: string;
  config: DevkitConfig;
  prompter: Prompter | null;
}): ParamSource[] {
  const sources: ParamSource[] = [
    staticSource('flag', params.flags),
    envSource(params.env),
    envSource(readEnvFile(path.join(params.projectRoot, '.env')), '.env'),
    staticSource('config', params.config.params ?? {})
  ];
  if (params.prompter) sources.push(promptSource(params.prompter));
  return sources;
}

/**
 * Shell choice: `--shell`, then `shell` in the config, then `$SHELL`.
 */
export function resolveShell(flag: ShellKind | undefined, config: DevkitConfig, env: NodeJS.ProcessEnv): ShellKind {
  return flag ?? config.shell ?? detectShell(env.SHELL);
}

export type CreateContextOptions = {
  projectRoot: string;
  env: NodeJS.ProcessEnv;
  config: DevkitConfig;
  params: Params;
  logger: ProvisionLogger;
  prompter: Prompter;
  shell?: ShellKind;
  autoYes?: boolean;
  checkOnly?: boolean;
  skip?: readonly string[];
  printer?: Printer;
  exec?: CommandRunner;
};

export function createProvisionContext(opts: CreateContextOptions): ProvisionContext {
  const homeDir = getHomeDir(opts.env);
  // Tools installed with `pip --user` or the Poetry installer land here.
  const env = withPathEntry(opts.env, path.join(homeDir, '.local', 'bin'));
  const shell = resolveShell(opts.shell, opts.config, env);
  const skip = [...new Set([...(opts.config.skip ?? []), ...(opts.skip ?? [])])];

  return {
    projectRoot: opts.projectRoot,
    homeDir,
    shell,
    rcFile: rcFileFor(shell, homeDir),
    env,
    exec:
      opts.exec ??
      createCommandRunner({ env, cwd: opts.projectRoot, log: (message) => opts.logger.debug(message) }),
    params: opts.params,
    prompter: opts.prompter,
    printer: opts.printer ?? print,
    logger: opts.logger,
    autoYes: opts.autoYes ?? false,
    checkOnly: opts.checkOnly ?? false,
    skip
  };
}
