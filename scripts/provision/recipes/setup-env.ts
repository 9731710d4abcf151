import path from 'node:path';

import { disablePackageMode, hasPackageModeSetting } from '../../lib/pyproject.js';
import { SHELL_PROFILES } from '../../lib/shell.js';
import { readTextIfExists, writeFileIfChanged } from '../../lib/text-file.js';
import type { Recipe } from '../recipe.js';
import { aptInstallCommand, blockStep, fromExec, missing, passed, probeEnvVar, probeFile, toolStep } from '../steps.js';
import type { ProvisionContext, Step } from '../types.js';
import {
  devToolSteps,
  direnvAllowStep,
  direnvHookStep,
  direnvToolStep,
  envrcStep,
  poetryInstallStep,
  poetryToolStep,
  precommitHookStep
} from './common.js';
import { DEV_TOOLS, DOCKER_INSTALL_COMMAND } from './packages.js';

const pyprojectPath = (ctx: ProvisionContext): string => path.join(ctx.projectRoot, 'pyproject.toml');

function requireUser(ctx: ProvisionContext): string {
  const user = ctx.env.USER?.trim();
  if (!user) throw new Error('USER is not set');
  return user;
}

export function buildSetupEnvSteps(): Step[] {
  const pyproject: Step = {
    id: 'pyproject',
    title: 'pyproject.toml present',
    probe: async (ctx) => probeFile(pyprojectPath(ctx))
  };

  const packageMode: Step = {
    id: 'package-mode',
    title: 'Poetry package mode disabled',
    dependsOn: ['pyproject'],
    confirm: false,
    async probe(ctx) {
      const content = readTextIfExists(pyprojectPath(ctx)) ?? '';
      return hasPackageModeSetting(content) ? passed('package-mode set') : missing('package-mode not set');
    },
    async remedy(ctx) {
      const file = pyprojectPath(ctx);
      const content = readTextIfExists(file) ?? '';
      const next = disablePackageMode(content);
      if (next === content) return { ok: false, error: 'no [tool.poetry] section in pyproject.toml' };
      writeFileIfChanged(file, next);
      return { ok: true };
    }
  };

  const dockerGroup: Step = {
    id: 'docker-group',
    title: 'user in docker group',
    dependsOn: ['docker'],
    async probe(ctx) {
      const user = requireUser(ctx);
      const res = await ctx.exec.cmd('id', ['-nG', user]);
      return res.ok && res.stdout.split(/\s+/).includes('docker')
        ? passed(`${user} is in the docker group`)
        : missing(`${user} is not in the docker group`);
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('sudo', ['usermod', '-aG', 'docker', requireUser(ctx)]));
    }
  };

  const virtualEnv: Step = {
    id: 'virtual-env',
    title: 'virtual environment active',
    probe: async (ctx) => probeEnvVar(ctx, 'VIRTUAL_ENV')
  };

  return [
    toolStep({ id: 'python3', tool: 'python3', install: aptInstallCommand(['python3', 'python3-pip']) }),
    direnvToolStep(),
    direnvHookStep({ id: 'direnv-hook', title: 'direnv hook in shell RC file' }),
    envrcStep('layout poetry', { overwrite: false }),
    direnvAllowStep(),
    poetryToolStep(['python3']),
    blockStep({
      id: 'local-bin-path',
      title: '~/.local/bin on PATH in shell RC file',
      file: (ctx) => ctx.rcFile,
      marker: () => '.local/bin',
      lines: (ctx) => [SHELL_PROFILES[ctx.shell].localBinPath]
    }),
    pyproject,
    packageMode,
    toolStep({ id: 'docker', tool: 'docker', install: DOCKER_INSTALL_COMMAND, interactive: true }),
    dockerGroup,
    virtualEnv,
    ...devToolSteps(DEV_TOOLS, ['pyproject', 'poetry']),
    poetryInstallStep({ args: ['--no-root'], dependsOn: ['pyproject', 'poetry'] }),
    precommitHookStep({
      command: ['poetry', 'run', 'pre-commit', 'install'],
      dependsOn: ['poetry-install'],
      severity: 'optional'
    })
  ];
}

export const setupEnvRecipe: Recipe = {
  id: 'setup-env',
  title: 'Set up and verify environment',
  description: 'Python, direnv, Poetry, Docker and dev tools for this project',
  params: [],
  build: () => buildSetupEnvSteps(),
  epilogue(ctx, report) {
    const remediedGroup = report.outcomes.some((o) => o.stepId === 'docker-group' && o.status === 'remedied');
    if (remediedGroup) {
      ctx.printer('Log out and back in (or run: newgrp docker) to use docker without sudo', 'cyan');
    }
    const remediedHook = report.outcomes.some((o) => o.stepId === 'direnv-hook' && o.status === 'remedied');
    if (remediedHook) {
      ctx.printer(`Open a new shell or run: source ${ctx.rcFile}`, 'cyan');
    }
  }
};
