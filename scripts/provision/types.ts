import type { CommandRunner } from '../lib/process.js';
import type { Params, Prompter } from '../lib/params.js';
import type { ShellKind } from '../lib/shell.js';
import type { Printer } from '../utils.js';
import type { ProvisionLogger } from './logger.js';

export type StepSeverity = 'required' | 'optional';

export type StepStatus = 'satisfied' | 'remedied' | 'failed' | 'skipped' | 'warned';

export type FailureReason =
  | 'no-remedy'
  | 'remedy-failed'
  | 'verify-failed'
  | 'probe-error'
  | 'missing-param'
  | 'declined'
  | 'check-only'
  | 'dependency-failed'
  | 'excluded';

export type ProbeResult = {
  ok: boolean;
  detail?: string;
};

export type RemedyResult = {
  ok: boolean;
  error?: string;
};

export type ProvisionContext = {
  projectRoot: string;
  homeDir: string;
  shell: ShellKind;
  /** RC file of the detected (or configured) shell. */
  rcFile: string;
  env: NodeJS.ProcessEnv;
  exec: CommandRunner;
  params: Params;
  prompter: Prompter;
  printer: Printer;
  logger: ProvisionLogger;
  /** Run remedies without asking. */
  autoYes: boolean;
  /** Probe only; never run a remedy. */
  checkOnly: boolean;
  /** Step ids excluded by configuration or `--skip`. */
  skip: readonly string[];
};

export type Step = {
  id: string;
  title: string;
  description?: string;
  /** Defaults to `required`. Optional failures are reported but don't fail the run. */
  severity?: StepSeverity;
  /** Ids of earlier steps that must end `satisfied` or `remedied`. */
  dependsOn?: readonly string[];
  /** Side-effect-free check of the target condition. */
  probe: (ctx: ProvisionContext) => Promise<ProbeResult>;
  /** Brings the system into the target condition. Absent when nothing can be done automatically. */
  remedy?: (ctx: ProvisionContext) => Promise<RemedyResult>;
  /** Confirms the remedy; the probe is re-run when absent. */
  verify?: (ctx: ProvisionContext) => Promise<ProbeResult>;
  /** Ask before running the remedy in interactive runs. Defaults to true. */
  confirm?: boolean;
};

export type StepOutcome = {
  stepId: string;
  title: string;
  status: StepStatus;
  severity: StepSeverity;
  reason?: FailureReason;
  detail?: string;
  durationMs: number;
};

export type RunReport = {
  recipe: string;
  startedAt: string;
  finishedAt?: string;
  outcomes: readonly StepOutcome[];
  /** Outcomes with status `failed` or `skipped`. */
  failures: number;
};
