import type { FailureReason, RunReport, StepOutcome, StepStatus } from './types.js';

export function createRunReport(recipe: string, now: Date = new Date()): RunReport {
  return {
    recipe,
    startedAt: now.toISOString(),
    outcomes: [],
    failures: 0
  };
}

export function isFailureStatus(status: StepStatus): boolean {
  return status === 'failed' || status === 'skipped';
}

export function isSuccessStatus(status: StepStatus): boolean {
  return status === 'satisfied' || status === 'remedied';
}

/**
 * New report with `outcome` appended. The input report is left untouched.
 */
export function recordOutcome(report: RunReport, outcome: StepOutcome): RunReport {
  return {
    ...report,
    outcomes: [...report.outcomes, outcome],
    failures: report.failures + (isFailureStatus(outcome.status) ? 1 : 0)
  };
}

export function finishRunReport(report: RunReport, now: Date = new Date()): RunReport {
  return { ...report, finishedAt: now.toISOString() };
}

export function findOutcome(report: RunReport, stepId: string): StepOutcome | undefined {
  return report.outcomes.find((o) => o.stepId === stepId);
}

export function countByStatus(report: RunReport): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = {
    satisfied: 0,
    remedied: 0,
    failed: 0,
    skipped: 0,
    warned: 0
  };
  for (const o of report.outcomes) counts[o.status]++;
  return counts;
}

export function exitCodeFor(report: RunReport): 0 | 1 {
  return report.failures === 0 ? 0 : 1;
}

export const REASON_LABELS: Readonly<Record<FailureReason, string>> = {
  'no-remedy': 'not satisfied and no automatic fix',
  'remedy-failed': 'fix failed',
  'verify-failed': 'fix ran but the check still fails',
  'probe-error': 'check errored',
  'missing-param': 'missing parameter',
  declined: 'fix declined',
  'check-only': 'not satisfied (check-only run)',
  'dependency-failed': 'skipped, a prerequisite step did not succeed',
  excluded: 'excluded by configuration'
};

export function describeOutcome(outcome: StepOutcome): string {
  if (outcome.status === 'satisfied') return outcome.detail ?? 'OK';
  if (outcome.status === 'remedied') return outcome.detail ? `fixed (${outcome.detail})` : 'fixed';
  const label = outcome.reason ? REASON_LABELS[outcome.reason] : outcome.status;
  return outcome.detail ? `${label}: ${outcome.detail}` : label;
}
