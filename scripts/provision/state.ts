/**
 * Last run of each recipe, persisted in `.cache/devkit-state.json`.
 */

import path from 'node:path';
import { z } from 'zod';

import { readJSON, writeJSON } from '../lib/config.js';
import type { RunReport } from './types.js';

const StepOutcomeSchema = z.object({
  stepId: z.string(),
  title: z.string(),
  status: z.enum(['satisfied', 'remedied', 'failed', 'skipped', 'warned']),
  severity: z.enum(['required', 'optional']),
  reason: z
    .enum([
      'no-remedy',
      'remedy-failed',
      'verify-failed',
      'probe-error',
      'missing-param',
      'declined',
      'check-only',
      'dependency-failed',
      'excluded'
    ])
    .optional(),
  detail: z.string().optional(),
  durationMs: z.number()
});

const RunReportSchema = z.object({
  recipe: z.string(),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  outcomes: z.array(StepOutcomeSchema),
  failures: z.number()
});

const ProvisionStateSchema = z.object({
  runs: z.record(z.string(), RunReportSchema)
});

export type ProvisionState = z.infer<typeof ProvisionStateSchema>;

export function getStatePath(projectRoot: string): string {
  return path.join(projectRoot, '.cache', 'devkit-state.json');
}

function createEmptyState(): ProvisionState {
  return { runs: {} };
}

/**
 * Read the state file; a missing or malformed file reads as empty.
 */
export function readProvisionState(projectRoot: string): ProvisionState {
  const parsed = ProvisionStateSchema.safeParse(readJSON(getStatePath(projectRoot)));
  return parsed.success ? parsed.data : createEmptyState();
}

export function saveRunReport(projectRoot: string, report: RunReport): ProvisionState {
  const state = readProvisionState(projectRoot);
  const next: ProvisionState = {
    ...state,
    runs: { ...state.runs, [report.recipe]: { ...report, outcomes: [...report.outcomes] } }
  };
  writeJSON(getStatePath(projectRoot), next);
  return next;
}
