import type { ParamName } from '../lib/params.js';
import type { DevkitConfig } from '../schemas/devkit-config.zod.js';
import type { ProvisionContext, RunReport, Step } from './types.js';

export const RECIPE_IDS = [
  'prereqs',
  'setup-env',
  'verify-env',
  'poetry-setup',
  'ssh-setup',
  'verify-precommit',
  'scaffold-samples',
  'init-project'
] as const;

export type RecipeId = (typeof RECIPE_IDS)[number];

export type RecipeOptions = {
  /** `init-project`: wipe `.git` and create a fresh single-commit history. */
  reinitGit: boolean;
};

export type RecipeInput = {
  config: DevkitConfig;
  options: RecipeOptions;
};

/**
 * A named, ordered list of steps. Parameters listed in `params` are resolved
 * (flags, env, `.env`, config, prompt) before `build` runs.
 */
export type Recipe = {
  id: RecipeId;
  title: string;
  description: string;
  params: readonly ParamName[];
  /** Parameters that may also be given as positional arguments, in order. */
  positionals?: readonly ParamName[];
  build: (input: RecipeInput) => Step[];
  /** Printed after the summary, e.g. follow-up instructions. */
  epilogue?: (ctx: ProvisionContext, report: RunReport) => void;
};

export function isRecipeId(value: unknown): value is RecipeId {
  return typeof value === 'string' && RECIPE_IDS.some((id) => id === value);
}
