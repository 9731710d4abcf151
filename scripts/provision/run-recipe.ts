import { readDevkitConfig } from '../lib/config.js';
import { createReadlinePrompter, PARAM_NAMES, resolveParams, type ParamName, type Params, type Prompter } from '../lib/params.js';
import type { CommandRunner } from '../lib/process.js';
import type { ShellKind } from '../lib/shell.js';
import { print, type Printer } from '../utils.js';
import { buildParamSources, createProvisionContext } from './context.js';
import { createProvisionLogger, getLogFilePath, type ProvisionLogger } from './logger.js';
import type { Recipe, RecipeId } from './recipe.js';
import { getRecipe } from './recipes/index.js';
import { exitCodeFor } from './report.js';
import { runSteps } from './runner.js';
import { saveRunReport } from './state.js';
import { printRunSummary } from './summary.js';
import type { RunReport } from './types.js';

export type RunRecipeOptions = {
  recipe: RecipeId;
  projectRoot: string;
  env: NodeJS.ProcessEnv;
  /** Parameter values given on the command line. */
  params?: Params;
  /** Positional arguments after the recipe name. */
  args?: readonly string[];
  shell?: ShellKind;
  autoYes?: boolean;
  checkOnly?: boolean;
  skip?: readonly string[];
  reinitGit?: boolean;
  printer?: Printer;
  /** `null` disables prompting for parameters. Defaults to the terminal unless `autoYes`. */
  prompter?: Prompter | null;
  exec?: CommandRunner;
  logger?: ProvisionLogger;
};

/**
 * Map positional arguments onto the recipe's positional parameters.
 * Named flags win over positionals.
 */
export function positionalParams(recipe: Recipe, args: readonly string[], flags: Params = {}): Params {
  const out: Params = {};
  const names: readonly ParamName[] = recipe.positionals ?? [];
  names.forEach((name, idx) => {
    const value = args[idx];
    if (value !== undefined && value !== '') out[name] = value;
  });
  for (const name of PARAM_NAMES) {
    const value = flags[name];
    if (value !== undefined) out[name] = value;
  }
  return out;
}

/**
 * Load config, resolve parameters, run the recipe's steps, persist the
 * report and print the summary. Config errors propagate to the caller.
 */
export async function runRecipe(opts: RunRecipeOptions): Promise<{ report: RunReport; exitCode: 0 | 1 }> {
  const recipe = getRecipe(opts.recipe);
  const printer = opts.printer ?? print;
  const autoYes = opts.autoYes ?? false;
  const { config } = readDevkitConfig(opts.projectRoot);

  const logFilePath = getLogFilePath(opts.projectRoot);
  const logger = opts.logger ?? createProvisionLogger(opts.projectRoot, { filePath: logFilePath });
  const terminal = createReadlinePrompter();
  const prompter = opts.prompter === undefined ? terminal : opts.prompter;
  const paramPrompter = autoYes || opts.checkOnly ? null : prompter;

  const flags = positionalParams(recipe, opts.args ?? [], opts.params);
  const { params, origins } = await resolveParams(
    recipe.params,
    buildParamSources({ flags, env: opts.env, projectRoot: opts.projectRoot, config, prompter: paramPrompter })
  );
  logger.info({ recipe: recipe.id, origins }, 'provision.params');

  const ctx = createProvisionContext({
    projectRoot: opts.projectRoot,
    env: opts.env,
    config,
    params,
    logger,
    prompter: prompter ?? terminal,
    shell: opts.shell,
    autoYes,
    checkOnly: opts.checkOnly,
    skip: opts.skip,
    printer,
    exec: opts.exec
  });

  printer(`${recipe.title} (${recipe.id})`, 'blue');
  const steps = recipe.build({ config, options: { reinitGit: opts.reinitGit ?? false } });
  const report = await runSteps(recipe.id, steps, ctx);

  saveRunReport(opts.projectRoot, report);
  printRunSummary(report, { printer, projectRoot: opts.projectRoot, logFilePath });
  recipe.epilogue?.(ctx, report);

  return { report, exitCode: exitCodeFor(report) };
}
