import type { DeletionAttempt, ExecutionSummary, RunMode, StopReason } from '@shared/types';

export interface SummaryContext {
  sessionId: string;
  mode: RunMode;
  notProcessed?: number;
  stopReason?: StopReason;
}

/**
 * Fold the audit trail of a run into its tally.
 *
 * Interactive "quit" attempts count as declined.
 */
export function summarizeAttempts(
  attempts: readonly DeletionAttempt[],
  context: SummaryContext
): ExecutionSummary {
  const initial: ExecutionSummary = {
    sessionId: context.sessionId,
    mode: context.mode,
    total: 0,
    skipped: 0,
    dryRunSimulated: 0,
    succeeded: 0,
    failed: 0,
    protectedByTag: 0,
    skippedByState: 0,
    skippedByAge: 0,
    declinedByUser: 0,
    backupFailures: 0,
    destroyFailures: 0,
    notProcessed: context.notProcessed ?? 0,
    stopReason: context.stopReason,
    estimatedMonthlySavings: 0,
  };

  const summary = attempts.reduce<ExecutionSummary>((acc, attempt) => {
    const next = { ...acc, total: acc.total + 1 };

    switch (attempt.outcome) {
      case 'Skipped':
        next.skipped++;
        break;
      case 'DryRunSimulated':
        next.dryRunSimulated++;
        break;
      case 'Succeeded':
        next.succeeded++;
        break;
      case 'Failed':
        next.failed++;
        break;
    }

    if (attempt.protectionState === 'ProtectedByTag') next.protectedByTag++;
    if (attempt.skipGate === 'state') next.skippedByState++;
    if (attempt.skipGate === 'age') next.skippedByAge++;
    if (attempt.skipGate === 'confirmation' || attempt.skipGate === 'quit') next.declinedByUser++;
    if (attempt.failureStage === 'backup') next.backupFailures++;
    if (attempt.failureStage === 'destroy') next.destroyFailures++;

    if (
      (attempt.outcome === 'Succeeded' || attempt.outcome === 'DryRunSimulated') &&
      attempt.estimatedMonthlyCost !== undefined
    ) {
      next.estimatedMonthlySavings += attempt.estimatedMonthlyCost;
    }
    return next;
  }, initial);

  return {
    ...summary,
    estimatedMonthlySavings: Math.round(summary.estimatedMonthlySavings * 100) / 100,
  };
}

/**
 * Human-readable summary lines for the terminal.
 */
export function formatExecutionSummary(summary: ExecutionSummary): string[] {
  const lines = [
    `Session: ${summary.sessionId} (${summary.mode})`,
    `Processed: ${summary.total}`,
    `  Skipped: ${summary.skipped} (state ${summary.skippedByState}, age ${summary.skippedByAge}, tag ${summary.protectedByTag}, declined ${summary.declinedByUser})`,
  ];
  if (summary.mode === 'dry-run') {
    lines.push(`  Simulated: ${summary.dryRunSimulated}`);
  } else {
    lines.push(`  Deleted: ${summary.succeeded}`);
  }
  lines.push(
    `  Failed: ${summary.failed} (backup ${summary.backupFailures}, delete ${summary.destroyFailures})`
  );
  if (summary.backupFailures > 0) {
    lines.push(`WARNING: ${summary.backupFailures} resource(s) could not be backed up and were left in place`);
  }
  if (summary.notProcessed > 0) {
    const why = summary.stopReason === 'user-quit' ? 'user quit' : 'resource limit reached';
    lines.push(`Not processed: ${summary.notProcessed} (${why})`);
  }
  const label = summary.mode === 'dry-run' ? 'Potential' : 'Estimated';
  lines.push(`${label} monthly savings: $${summary.estimatedMonthlySavings.toFixed(2)} (estimate)`);
  return lines;
}
