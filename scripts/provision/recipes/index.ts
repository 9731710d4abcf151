import type { Recipe, RecipeId } from '../recipe.js';
import { initProjectRecipe } from './init-project.js';
import { poetrySetupRecipe } from './poetry-setup.js';
import { prereqsRecipe } from './prereqs.js';
import { scaffoldSamplesRecipe } from './scaffold-samples.js';
import { setupEnvRecipe } from './setup-env.js';
import { sshSetupRecipe } from './ssh-setup.js';
import { verifyEnvRecipe } from './verify-env.js';
import { verifyPrecommitRecipe } from './verify-precommit.js';

export const RECIPES: Readonly<Record<RecipeId, Recipe>> = {
  prereqs: prereqsRecipe,
  'setup-env': setupEnvRecipe,
  'verify-env': verifyEnvRecipe,
  'poetry-setup': poetrySetupRecipe,
  'ssh-setup': sshSetupRecipe,
  'verify-precommit': verifyPrecommitRecipe,
  'scaffold-samples': scaffoldSamplesRecipe,
  'init-project': initProjectRecipe
};

export function getRecipe(id: RecipeId): Recipe {
  return RECIPES[id];
}
