/**
 * Zod schema for `devkit.config.yml`.
 *
 * Notes:
 * - Every field is optional; an absent file is the same as `{}`.
 * - Kept permissive via `.passthrough()` so unknown keys don't break older tools.
 */
import { z } from 'zod';

import { SHELL_KINDS } from '../lib/shell.js';

/**
 * Extra file written by the `scaffold-samples` recipe.
 */
const SampleFileSchema = z
  .object({
    path: z.string().min(1),
    content: z.string(),
    executable: z.boolean().optional(),
  })
  .passthrough();

const ParamsSchema = z
  .object({
    sshKeyName: z.string().optional(),
    sshEmail: z.string().optional(),
    gitName: z.string().optional(),
    gitEmail: z.string().optional(),
    projectName: z.string().optional(),
    projectDescription: z.string().optional(),
    authorName: z.string().optional(),
    authorEmail: z.string().optional(),
  })
  .strict();

export const DevkitConfigSchema = z
  .object({
    /** Overrides `$SHELL` detection. */
    shell: z.enum(SHELL_KINDS).optional(),
    /** Defaults for recipe parameters (lowest precedence before prompting). */
    params: ParamsSchema.optional(),
    /** Tools `verify-env` expects on PATH. */
    tools: z
      .array(z.string().min(1))
      .refine((list) => new Set(list).size === list.length, { message: 'duplicate entries' })
      .optional(),
    /** Step ids to leave out of every run. */
    skip: z.array(z.string().min(1)).optional(),
    samples: z.array(SampleFileSchema).optional(),
  })
  .passthrough();

export type DevkitConfig = z.infer<typeof DevkitConfigSchema>;
export type SampleFile = z.infer<typeof SampleFileSchema>;
