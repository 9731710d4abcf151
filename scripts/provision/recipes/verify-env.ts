import type { Recipe } from '../recipe.js';
import { probeEnvVar, toolStep } from '../steps.js';
import type { Step } from '../types.js';
import { DEFAULT_VERIFY_TOOLS } from './packages.js';

export const verifyEnvRecipe: Recipe = {
  id: 'verify-env',
  title: 'Verify environment',
  description: 'Virtualenv active, direnv loaded, lint/format tools on PATH',
  params: [],
  build({ config }) {
    const virtualEnv: Step = {
      id: 'virtual-env',
      title: 'virtual environment active',
      async probe(ctx) {
        const res = probeEnvVar(ctx, 'VIRTUAL_ENV');
        if (!res.ok) return res;
        const venv = ctx.env.VIRTUAL_ENV ?? '';
        return venv.includes('.venv')
          ? res
          : { ok: true, detail: `${venv} (does not look like the Poetry-managed .venv)` };
      }
    };

    const direnvActive: Step = {
      id: 'direnv-active',
      title: 'direnv active in this directory',
      probe: async (ctx) => probeEnvVar(ctx, 'DIRENV_DIR')
    };

    const tools: readonly string[] = config.tools ?? DEFAULT_VERIFY_TOOLS;
    return [virtualEnv, direnvActive, ...tools.map((tool) => toolStep({ id: `tool-${tool}`, tool }))];
  }
};
