import path from 'node:path';

import type { Recipe } from '../recipe.js';
import { probeFile, toolStep } from '../steps.js';
import { precommitHookStep, precommitRunStep } from './common.js';

export const verifyPrecommitRecipe: Recipe = {
  id: 'verify-precommit',
  title: 'Verify pre-commit',
  description: 'pre-commit installed, configured, hooked into git and passing',
  params: [],
  build: () => [
    toolStep({ id: 'precommit-tool', tool: 'pre-commit' }),
    {
      id: 'precommit-config',
      title: '.pre-commit-config.yaml present',
      probe: async (ctx) => probeFile(path.join(ctx.projectRoot, '.pre-commit-config.yaml'))
    },
    precommitHookStep({ command: ['pre-commit', 'install'], dependsOn: ['precommit-tool', 'precommit-config'] }),
    precommitRunStep({ dependsOn: ['precommit-hook'] })
  ]
};
