import path from 'node:path';

import { symbols, type Printer } from '../utils.js';
import { countByStatus, describeOutcome } from './report.js';
import type { RunReport } from './types.js';

export function printRunSummary(
  report: RunReport,
  params: { printer: Printer; projectRoot: string; logFilePath?: string }
): { hasFailures: boolean } {
  const { printer, projectRoot, logFilePath } = params;
  const counts = countByStatus(report);
  const hasFailures = report.failures > 0;

  if (hasFailures) {
    printer(`\n${symbols.warning} ${report.recipe.toUpperCase()} FINISHED WITH ERRORS`, 'yellow');
  } else {
    printer(`\n${symbols.success} ${report.recipe} completed successfully`, 'green');
  }

  const ok = counts.satisfied + counts.remedied;
  printer(
    `  Steps: ${ok}/${report.outcomes.length} ok (${counts.satisfied} already satisfied, ${counts.remedied} fixed)`,
    hasFailures ? 'red' : 'green'
  );
  if (counts.warned > 0) {
    printer(`  Warnings: ${counts.warned}`, 'yellow');
  }

  for (const outcome of report.outcomes) {
    if (outcome.status === 'failed' || outcome.status === 'skipped') {
      printer(`  ${symbols.error} ${outcome.stepId}: ${describeOutcome(outcome)}`, 'red');
    } else if (outcome.status === 'warned') {
      printer(`  ${symbols.warning} ${outcome.stepId}: ${describeOutcome(outcome)}`, 'yellow');
    }
  }

  if (hasFailures && logFilePath) {
    const rel = path.relative(projectRoot, logFilePath) || logFilePath;
    printer(`  ${symbols.info} See log: ${rel}`, 'cyan');
  }

  return { hasFailures };
}
