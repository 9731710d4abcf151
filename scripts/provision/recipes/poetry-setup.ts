import path from 'node:path';

import { rcFileFor } from '../../lib/shell.js';
import type { Recipe } from '../recipe.js';
import { fromExec, probeDirectory, probeFile } from '../steps.js';
import type { Step } from '../types.js';
import {
  devToolSteps,
  direnvAllowStep,
  direnvHookStep,
  direnvToolStep,
  envrcStep,
  poetryInstallStep,
  poetryToolStep
} from './common.js';
import { DEV_TOOLS } from './packages.js';

export const POETRY_ENVRC_LINE = 'source "$(poetry env info --path)/bin/activate"';

export function buildPoetrySetupSteps(): Step[] {
  const projectRoot: Step = {
    id: 'project-root',
    title: 'running from the project root',
    severity: 'optional',
    async probe(ctx) {
      const git = probeDirectory(path.join(ctx.projectRoot, '.git'), '.git');
      if (!git.ok) return git;
      return probeDirectory(path.join(ctx.projectRoot, 'scripts'), 'scripts');
    }
  };

  const pyproject: Step = {
    id: 'pyproject',
    title: 'pyproject.toml present',
    dependsOn: ['poetry'],
    probe: async (ctx) => probeFile(path.join(ctx.projectRoot, 'pyproject.toml')),
    async remedy(ctx) {
      const name = ctx.params.projectName ?? path.basename(ctx.projectRoot);
      const author =
        ctx.params.authorName && ctx.params.authorEmail
          ? `${ctx.params.authorName} <${ctx.params.authorEmail}>`
          : 'Your Name <you@example.com>';
      const res = await ctx.exec.cmd(
        'poetry',
        [
          'init',
          '--name',
          name,
          '--description',
          ctx.params.projectDescription ?? 'Project devkit template',
          '--author',
          author,
          '--license',
          'MIT',
          '--python',
          '^3.12',
          '--no-interaction'
        ],
        { cwd: ctx.projectRoot }
      );
      return fromExec(res);
    }
  };

  return [
    projectRoot,
    poetryToolStep(),
    pyproject,
    ...devToolSteps(DEV_TOOLS, ['pyproject']),
    poetryInstallStep({ args: ['--no-root'], dependsOn: ['pyproject'] }),
    direnvToolStep(),
    envrcStep(POETRY_ENVRC_LINE, { overwrite: true }),
    direnvAllowStep(),
    direnvHookStep({
      id: 'direnv-hook-bash',
      title: 'direnv hook in ~/.bashrc',
      rcFile: (ctx) => rcFileFor('bash', ctx.homeDir),
      onlyIfExists: true
    }),
    direnvHookStep({
      id: 'direnv-hook-zsh',
      title: 'direnv hook in ~/.zshrc',
      rcFile: (ctx) => rcFileFor('zsh', ctx.homeDir),
      onlyIfExists: true
    })
  ];
}

export const poetrySetupRecipe: Recipe = {
  id: 'poetry-setup',
  title: 'Poetry project setup',
  description: 'pyproject.toml, dev dependencies, virtualenv and direnv auto-activation',
  params: [],
  build: () => buildPoetrySetupSteps(),
  epilogue(ctx, report) {
    if (report.failures === 0) {
      ctx.printer('The environment will auto-activate when you enter this directory (via direnv).', 'cyan');
    }
  }
};
