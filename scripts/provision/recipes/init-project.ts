import fs from 'node:fs';
import path from 'node:path';

import { requireParam } from '../../lib/params.js';
import { shellQuote } from '../../lib/process.js';
import {
  formatAuthors,
  formatFieldValue,
  readFieldRaw,
  readStringField,
  setField,
  type PyprojectField
} from '../../lib/pyproject.js';
import { readTextIfExists } from '../../lib/text-file.js';
import type { Recipe } from '../recipe.js';
import { fromExec, missing, passed, probeFile } from '../steps.js';
import type { ProvisionContext, Step } from '../types.js';

export function initialCommitMessage(projectName: string): string {
  return `Initial commit for ${projectName}`;
}

function pyprojectPath(ctx: ProvisionContext): string {
  return path.join(ctx.projectRoot, 'pyproject.toml');
}

function pyprojectFieldStep(field: PyprojectField, value: (ctx: ProvisionContext) => string): Step {
  const expected = (ctx: ProvisionContext): string => formatFieldValue(field, value(ctx));
  return {
    id: `pyproject-${field}`,
    title: `pyproject.toml ${field}`,
    dependsOn: ['pyproject'],
    confirm: false,
    async probe(ctx) {
      const content = readTextIfExists(pyprojectPath(ctx)) ?? '';
      const raw = readFieldRaw(content, field);
      if (raw === null) return missing(`no ${field} field in pyproject.toml`);
      const want = expected(ctx);
      const matches = field === 'authors' ? raw === want : readStringField(content, field) === value(ctx);
      return matches ? passed(`${field} = ${want}`) : missing(`${field} is ${raw}`);
    },
    async remedy(ctx) {
      const file = pyprojectPath(ctx);
      const content = readTextIfExists(file);
      if (content === null) return { ok: false, error: 'pyproject.toml not found' };
      fs.writeFileSync(file, setField(content, field, expected(ctx)), 'utf8');
      return { ok: true };
    }
  };
}

function readmeTitleStep(): Step {
  const readmePath = (ctx: ProvisionContext): string => path.join(ctx.projectRoot, 'README.md');
  const title = (ctx: ProvisionContext): string => `# ${requireParam(ctx.params, 'projectName')}`;
  return {
    id: 'readme-title',
    title: 'README.md title',
    dependsOn: ['pyproject'],
    confirm: false,
    async probe(ctx) {
      const content = readTextIfExists(readmePath(ctx));
      if (content === null) return passed('no README.md');
      const first = content.split('\n')[0];
      return first === title(ctx) ? passed(first) : missing(`first line is "${first}"`);
    },
    async remedy(ctx) {
      const file = readmePath(ctx);
      const lines = (readTextIfExists(file) ?? '').split('\n');
      lines[0] = title(ctx);
      fs.writeFileSync(file, lines.join('\n'), 'utf8');
      return { ok: true };
    }
  };
}

/**
 * Fresh single-commit history. Satisfied once the only commit carries the
 * initial message for the current project name.
 */
function gitReinitStep(): Step {
  return {
    id: 'git-reinit',
    title: 'Git history reinitialized',
    dependsOn: ['pyproject'],
    async probe(ctx) {
      const message = initialCommitMessage(requireParam(ctx.params, 'projectName'));
      const res = await ctx.exec.cmd('git', ['log', '--format=%s'], { cwd: ctx.projectRoot });
      if (!res.ok) return missing('no Git history');
      return res.stdout === message ? passed(message) : missing('history is not a single initial commit');
    },
    async remedy(ctx) {
      const message = initialCommitMessage(requireParam(ctx.params, 'projectName'));
      const res = await ctx.exec.shell(
        `rm -rf .git && git init && git add . && git commit -m ${shellQuote(message)}`,
        { cwd: ctx.projectRoot }
      );
      return fromExec(res);
    }
  };
}

export function buildInitProjectSteps(opts: { reinitGit: boolean }): Step[] {
  const steps: Step[] = [
    {
      id: 'pyproject',
      title: 'pyproject.toml present',
      probe: async (ctx) => probeFile(pyprojectPath(ctx))
    },
    pyprojectFieldStep('name', (ctx) => requireParam(ctx.params, 'projectName')),
    pyprojectFieldStep('description', (ctx) => requireParam(ctx.params, 'projectDescription')),
    pyprojectFieldStep('authors', (ctx) =>
      formatAuthors(requireParam(ctx.params, 'authorName'), requireParam(ctx.params, 'authorEmail'))
    ),
    readmeTitleStep()
  ];
  if (opts.reinitGit) steps.push(gitReinitStep());
  return steps;
}

export const initProjectRecipe: Recipe = {
  id: 'init-project',
  title: 'Initialize project from template',
  description: 'Project name, description and authors in pyproject.toml, README title, optional fresh Git history',
  params: ['projectName', 'projectDescription', 'authorName', 'authorEmail'],
  build: ({ options }) => buildInitProjectSteps({ reinitGit: options.reinitGit })
};
