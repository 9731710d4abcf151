import path from 'node:path';

import { shellQuote } from '../../lib/process.js';
import { isFile } from '../../lib/text-file.js';
import type { Recipe } from '../recipe.js';
import { aptInstallCommand, fromExec, missing, passed, shellRemedy, toolStep } from '../steps.js';
import type { Step } from '../types.js';
import { poetryInstallStep, poetryToolStep } from './common.js';
import { APT_TOOLS, SHFMT_URL } from './packages.js';

function buildPrereqSteps(): Step[] {
  const aptSteps = APT_TOOLS.map(({ tool, pkg }) =>
    toolStep({ id: `apt-${tool}`, tool, install: aptInstallCommand([pkg]) })
  );

  const poetryInProject: Step = {
    id: 'poetry-in-project',
    title: 'Poetry creates virtualenvs inside the project',
    dependsOn: ['poetry'],
    confirm: false,
    async probe(ctx) {
      const res = await ctx.exec.cmd('poetry', ['config', 'virtualenvs.in-project']);
      return res.ok && res.stdout === 'true' ? passed('virtualenvs.in-project = true') : missing('virtualenvs.in-project is not true');
    },
    async remedy(ctx) {
      return fromExec(await ctx.exec.cmd('poetry', ['config', 'virtualenvs.in-project', 'true']));
    }
  };

  const shfmt: Step = {
    id: 'shfmt',
    title: 'shfmt (shell formatter) available',
    dependsOn: ['apt-curl'],
    async probe(ctx) {
      if (await ctx.exec.which('shfmt')) return passed('shfmt found');
      const bin = path.join(ctx.homeDir, '.local', 'bin', 'shfmt');
      return isFile(bin) ? passed(`${bin} exists`) : missing('shfmt not found in PATH');
    },
    remedy: shellRemedy((ctx) => {
      const binDir = path.join(ctx.homeDir, '.local', 'bin');
      const bin = path.join(binDir, 'shfmt');
      return `mkdir -p ${shellQuote(binDir)} && curl -sSLo ${shellQuote(bin)} ${SHFMT_URL} && chmod +x ${shellQuote(bin)}`;
    })
  };

  return [
    ...aptSteps,
    poetryToolStep(['apt-curl', 'apt-python3']),
    poetryInProject,
    poetryInstallStep({ args: [], dependsOn: ['poetry'], allowNoProject: true }),
    shfmt
  ];
}

export const prereqsRecipe: Recipe = {
  id: 'prereqs',
  title: 'Install prerequisites',
  description: 'System packages (git, ssh, python3, pip, curl), Poetry and shfmt',
  params: [],
  build: () => buildPrereqSteps(),
  epilogue(ctx, report) {
    if (report.failures > 0) return;
    const hasProject = isFile(path.join(ctx.projectRoot, 'pyproject.toml'));
    ctx.printer(
      hasProject
        ? 'To enter your Poetry-managed virtual environment, run: poetry shell'
        : 'Create a pyproject.toml (devkit run poetry-setup) to get a Poetry environment',
      'cyan'
    );
  }
};
