import { confirm, MissingParamError } from '../lib/params.js';
import { symbols, type Color } from '../utils.js';
import { createRunReport, describeOutcome, findOutcome, finishRunReport, isSuccessStatus, recordOutcome } from './report.js';
import type {
  FailureReason,
  ProbeResult,
  ProvisionContext,
  RunReport,
  Step,
  StepOutcome,
  StepSeverity,
  StepStatus
} from './types.js';

type StepResult = {
  status: StepStatus;
  reason?: FailureReason;
  detail?: string;
};

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function reasonForError(e: unknown, fallback: FailureReason): FailureReason {
  return e instanceof MissingParamError ? 'missing-param' : fallback;
}

/**
 * Reject step lists the runner cannot order: duplicate ids, and `dependsOn`
 * entries that don't name an earlier step.
 */
export function validateSteps(steps: readonly Step[]): void {
  const seen = new Set<string>();
  for (const step of steps) {
    if (seen.has(step.id)) throw new Error(`Duplicate step id: ${step.id}`);
    for (const dep of step.dependsOn ?? []) {
      if (!seen.has(dep)) throw new Error(`Step ${step.id} depends on ${dep}, which does not run before it`);
    }
    seen.add(step.id);
  }
}

async function probeOnce(
  fn: (ctx: ProvisionContext) => Promise<ProbeResult>,
  ctx: ProvisionContext
): Promise<{ result: ProbeResult } | { error: unknown }> {
  try {
    return { result: await fn(ctx) };
  } catch (e) {
    return { error: e };
  }
}

async function executeStep(step: Step, ctx: ProvisionContext, report: RunReport): Promise<StepResult> {
  if (ctx.skip.includes(step.id)) {
    return { status: 'warned', reason: 'excluded' };
  }

  const blocking = (step.dependsOn ?? []).filter((dep) => {
    const outcome = findOutcome(report, dep);
    return !outcome || !isSuccessStatus(outcome.status);
  });
  if (blocking.length > 0) {
    return { status: 'skipped', reason: 'dependency-failed', detail: blocking.join(', ') };
  }

  const probed = await probeOnce(step.probe, ctx);
  if ('error' in probed) {
    return { status: 'failed', reason: reasonForError(probed.error, 'probe-error'), detail: describeError(probed.error) };
  }
  if (probed.result.ok) {
    return { status: 'satisfied', detail: probed.result.detail };
  }

  const probeDetail = probed.result.detail;
  if (!step.remedy) {
    return { status: 'failed', reason: 'no-remedy', detail: probeDetail };
  }
  if (ctx.checkOnly) {
    return { status: 'failed', reason: 'check-only', detail: probeDetail };
  }

  ctx.printer(`  ${symbols.info} ${step.title}: ${probeDetail ?? 'not satisfied'}`, 'cyan');

  if (step.confirm !== false && !ctx.autoYes) {
    const accepted = await confirm(ctx.prompter, `  Fix "${step.title}" now?`);
    if (!accepted) {
      return { status: 'failed', reason: 'declined', detail: probeDetail };
    }
  } else if (ctx.autoYes) {
    ctx.logger.info({ stepId: step.id }, 'provision.step.auto_yes');
  }

  ctx.logger.info({ stepId: step.id, probeDetail }, 'provision.step.remedy');
  try {
    const remedy = await step.remedy(ctx);
    if (!remedy.ok) {
      return { status: 'failed', reason: 'remedy-failed', detail: remedy.error };
    }
  } catch (e) {
    return { status: 'failed', reason: reasonForError(e, 'remedy-failed'), detail: describeError(e) };
  }

  const verified = await probeOnce(step.verify ?? step.probe, ctx);
  if ('error' in verified) {
    return { status: 'failed', reason: reasonForError(verified.error, 'verify-failed'), detail: describeError(verified.error) };
  }
  if (!verified.result.ok) {
    return { status: 'failed', reason: 'verify-failed', detail: verified.result.detail };
  }
  return { status: 'remedied', detail: verified.result.detail };
}

function applySeverity(result: StepResult, severity: StepSeverity): StepResult {
  if (severity === 'optional' && (result.status === 'failed' || result.status === 'skipped')) {
    return { ...result, status: 'warned' };
  }
  return result;
}

const STATUS_STYLE: Readonly<Record<StepStatus, { symbol: string; color: Color }>> = {
  satisfied: { symbol: symbols.success, color: 'green' },
  remedied: { symbol: symbols.success, color: 'green' },
  failed: { symbol: symbols.error, color: 'red' },
  skipped: { symbol: symbols.skip, color: 'yellow' },
  warned: { symbol: symbols.warning, color: 'yellow' }
};

/**
 * Run `steps` in order and return the resulting report.
 *
 * Each step is probed; a failing probe triggers the remedy (at most once) and
 * a verification. A failing step never stops the run: later steps still
 * execute, and only `dependsOn` links turn a failure into skips.
 */
export async function runSteps(recipe: string, steps: readonly Step[], ctx: ProvisionContext): Promise<RunReport> {
  validateSteps(steps);

  let report = createRunReport(recipe);
  ctx.logger.info({ recipe, projectRoot: ctx.projectRoot, steps: steps.length, checkOnly: ctx.checkOnly }, 'provision.start');

  for (const [idx, step] of steps.entries()) {
    const stepNum = idx + 1;
    const severity = step.severity ?? 'required';
    const startedAt = Date.now();

    ctx.printer(`Checking ${step.title}...`, 'cyan');
    ctx.logger.info({ stepId: step.id, stepNum, title: step.title }, 'provision.step.start');

    const result = applySeverity(await executeStep(step, ctx, report), severity);
    const outcome: StepOutcome = {
      stepId: step.id,
      title: step.title,
      status: result.status,
      severity,
      ...(result.reason ? { reason: result.reason } : {}),
      ...(result.detail ? { detail: result.detail } : {}),
      durationMs: Date.now() - startedAt
    };
    report = recordOutcome(report, outcome);

    const style = STATUS_STYLE[outcome.status];
    ctx.printer(`  ${style.symbol} ${step.title} - ${describeOutcome(outcome)}`, style.color);

    const logFields = { stepId: step.id, stepNum, reason: outcome.reason, detail: outcome.detail };
    if (outcome.status === 'failed' || outcome.status === 'skipped') {
      ctx.logger.error(logFields, `provision.step.${outcome.status}`);
    } else if (outcome.status === 'warned') {
      ctx.logger.warn(logFields, 'provision.step.warned');
    } else {
      ctx.logger.info(logFields, `provision.step.${outcome.status}`);
    }
  }

  report = finishRunReport(report);
  ctx.logger.info({ recipe, failures: report.failures }, 'provision.finish');
  return report;
}
