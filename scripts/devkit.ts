#!/usr/bin/env node

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import { ConfigError, readDevkitConfig } from './lib/config.js';
import { type Params } from './lib/params.js';
import { findProjectRoot } from './lib/project-root.js';
import { isShellKind, SHELL_KINDS } from './lib/shell.js';
import { isRecipeId, RECIPE_IDS, type RecipeId } from './provision/recipe.js';
import { RECIPES } from './provision/recipes/index.js';
import { runRecipe } from './provision/run-recipe.js';
import { readProvisionState } from './provision/state.js';
import { parseCommaList, print, symbols } from './utils.js';

function resolveProjectRoot(flag: string | undefined): string {
  const invocationCwd = process.env.INIT_CWD ? path.resolve(process.env.INIT_CWD) : process.cwd();
  if (flag) return path.resolve(invocationCwd, flag);
  return findProjectRoot(invocationCwd) ?? invocationCwd;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function listRecipes(): void {
  for (const id of RECIPE_IDS) {
    const recipe = RECIPES[id];
    print(`${id.padEnd(18)} ${recipe.description}`);
  }
}

function listSteps(id: RecipeId, projectRoot: string): void {
  const recipe = RECIPES[id];
  const { config } = readDevkitConfig(projectRoot);
  print(`${recipe.title} (${recipe.id})`, 'blue');
  if (recipe.params.length > 0) print(`  params: ${recipe.params.join(', ')}`, 'cyan');
  const steps = recipe.build({ config, options: { reinitGit: true } });
  for (const step of steps) {
    const tags = [step.severity === 'optional' ? 'optional' : '', step.remedy ? '' : 'check only']
      .filter((t) => t.length > 0)
      .join(', ');
    print(`  ${step.id.padEnd(28)} ${step.title}${tags ? ` [${tags}]` : ''}`);
  }
}

function printStatus(projectRoot: string): void {
  const state = readProvisionState(projectRoot);
  const runs = Object.values(state.runs);
  if (runs.length === 0) {
    print('No recorded runs.', 'yellow');
    return;
  }
  for (const run of runs) {
    const ok = run.failures === 0;
    const when = run.finishedAt ?? run.startedAt;
    print(
      `${ok ? symbols.success : symbols.error} ${run.recipe.padEnd(18)} ${when}  ${run.failures} failure(s)`,
      ok ? 'green' : 'red'
    );
  }
}

async function main(argv = process.argv): Promise<void> {
  const y = yargs(hideBin(argv))
    .scriptName('devkit')
    .option('project-root', {
      type: 'string',
      describe: 'Project root directory (defaults to auto-detected)'
    })
    .command(
      'run <recipe> [args..]',
      'Check and fix one part of the development environment',
      (yy) =>
        yy
          .positional('recipe', {
            type: 'string',
            choices: RECIPE_IDS,
            describe: 'Recipe to run',
            demandOption: true
          })
          .positional('args', {
            type: 'string',
            array: true,
            describe: 'Positional parameters (ssh-setup: keyName email gitName gitEmail)'
          })
          .option('shell', { type: 'string', choices: SHELL_KINDS, describe: 'Shell whose RC file is edited' })
          .option('y', {
            alias: ['yes', 'non-interactive'],
            type: 'boolean',
            default: false,
            describe: 'Apply fixes without asking (and never prompt)'
          })
          .option('check-only', { type: 'boolean', default: false, describe: 'Only check, never fix' })
          .option('skip', { type: 'string', describe: 'Comma-separated step ids to skip' })
          .option('ssh-key-name', { type: 'string' })
          .option('ssh-email', { type: 'string' })
          .option('git-name', { type: 'string' })
          .option('git-email', { type: 'string' })
          .option('project-name', { type: 'string' })
          .option('project-description', { type: 'string' })
          .option('author-name', { type: 'string' })
          .option('author-email', { type: 'string' })
          .option('reinit-git', {
            type: 'boolean',
            default: false,
            describe: 'init-project: replace the Git history with a single initial commit'
          }),
      async (args) => {
        const recipe = args.recipe;
        if (!isRecipeId(recipe)) throw new Error(`Unknown recipe: ${String(recipe)}`);
        const shell = args.shell;
        if (shell !== undefined && !isShellKind(shell)) throw new Error(`Unknown shell: ${shell}`);

        const params: Params = {
          sshKeyName: optionalString(args['ssh-key-name']),
          sshEmail: optionalString(args['ssh-email']),
          gitName: optionalString(args['git-name']),
          gitEmail: optionalString(args['git-email']),
          projectName: optionalString(args['project-name']),
          projectDescription: optionalString(args['project-description']),
          authorName: optionalString(args['author-name']),
          authorEmail: optionalString(args['author-email'])
        };

        const { exitCode } = await runRecipe({
          recipe,
          projectRoot: resolveProjectRoot(optionalString(args['project-root'])),
          env: process.env,
          params,
          args: (args.args ?? []).map(String),
          shell,
          autoYes: Boolean(args.y),
          checkOnly: Boolean(args['check-only']),
          skip: parseCommaList(optionalString(args.skip)),
          reinitGit: Boolean(args['reinit-git'])
        });
        process.exitCode = exitCode;
      }
    )
    .command(
      'list [recipe]',
      'List recipes, or the steps of one recipe',
      (yy) => yy.positional('recipe', { type: 'string', choices: RECIPE_IDS, describe: 'Recipe to describe' }),
      (args) => {
        const recipe = args.recipe;
        if (recipe === undefined) {
          listRecipes();
          return;
        }
        if (!isRecipeId(recipe)) throw new Error(`Unknown recipe: ${recipe}`);
        listSteps(recipe, resolveProjectRoot(optionalString(args['project-root'])));
      }
    )
    .command(
      'status',
      'Show the last recorded result of each recipe',
      () => {},
      (args) => {
        printStatus(resolveProjectRoot(optionalString(args['project-root'])));
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .alias('help', 'h');

  await y.parseAsync();
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    if (e instanceof ConfigError) {
      print(`${symbols.error} ${e.message}`, 'red');
    } else {
      // eslint-disable-next-line no-console
      console.error(e instanceof Error ? e.stack || e.message : String(e));
    }
    process.exit(1);
  });
}

export { main };
