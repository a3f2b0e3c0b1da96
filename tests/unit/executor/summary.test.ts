import { describe, it, expect } from 'vitest';
import { formatExecutionSummary, summarizeAttempts } from '@/executor/summary';
import type { DeletionAttempt } from '@shared/types';
import { volume } from '../../helpers/fixtures';

function attempt(overrides: Partial<DeletionAttempt>): DeletionAttempt {
  return {
    sessionId: 'test-session',
    sequence: 1,
    mode: 'automated',
    record: volume(),
    protectionState: 'Unprotected',
    outcome: 'Succeeded',
    detail: 'Deleted Volume vol-0abc123',
    startedAt: '2026-03-01T00:00:00.000Z',
    finishedAt: '2026-03-01T00:00:01.000Z',
    ...overrides,
  };
}

describe('summarizeAttempts', () => {
  it('counts outcomes, skip gates and failure stages', () => {
    const attempts = [
      attempt({ outcome: 'Succeeded', estimatedMonthlyCost: 8.1 }),
      attempt({ outcome: 'Succeeded', estimatedMonthlyCost: 0.2 }),
      attempt({ outcome: 'Succeeded' }),
      attempt({ outcome: 'Skipped', protectionState: 'ProtectedByTag', skipGate: 'tag' }),
      attempt({ outcome: 'Skipped', protectionState: 'ProtectedByAge', skipGate: 'age' }),
      attempt({ outcome: 'Skipped', protectionState: 'ProtectedByState', skipGate: 'state' }),
      attempt({ outcome: 'Skipped', skipGate: 'confirmation' }),
      attempt({ outcome: 'Failed', failureStage: 'backup', estimatedMonthlyCost: 50 }),
      attempt({ outcome: 'Failed', failureStage: 'destroy' }),
    ];

    expect(summarizeAttempts(attempts, { sessionId: 'test-session', mode: 'automated' })).toEqual({
      sessionId: 'test-session',
      mode: 'automated',
      total: 9,
      skipped: 4,
      dryRunSimulated: 0,
      succeeded: 3,
      failed: 2,
      protectedByTag: 1,
      skippedByState: 1,
      skippedByAge: 1,
      declinedByUser: 1,
      backupFailures: 1,
      destroyFailures: 1,
      notProcessed: 0,
      stopReason: undefined,
      estimatedMonthlySavings: 8.3,
    });
  });

  it('summarizes an empty run', () => {
    const summary = summarizeAttempts([], {
      sessionId: 'test-session',
      mode: 'dry-run',
      notProcessed: 3,
      stopReason: 'max-resources',
    });
    expect(summary.total).toBe(0);
    expect(summary.notProcessed).toBe(3);
    expect(summary.estimatedMonthlySavings).toBe(0);
  });
});

describe('formatExecutionSummary', () => {
  it('separates skips, failures and early stops', () => {
    const summary = summarizeAttempts(
      [
        attempt({ outcome: 'Succeeded', estimatedMonthlyCost: 3.6 }),
        attempt({ outcome: 'Failed', failureStage: 'backup' }),
        attempt({ outcome: 'Skipped', skipGate: 'quit' }),
      ],
      { sessionId: 'test-session', mode: 'interactive', notProcessed: 2, stopReason: 'user-quit' }
    );

    expect(formatExecutionSummary(summary)).toEqual([
      'Session: test-session (interactive)',
      'Processed: 3',
      '  Skipped: 1 (state 0, age 0, tag 0, declined 1)',
      '  Deleted: 1',
      '  Failed: 1 (backup 1, delete 0)',
      'WARNING: 1 resource(s) could not be backed up and were left in place',
      'Not processed: 2 (user quit)',
      'Estimated monthly savings: $3.60 (estimate)',
    ]);
  });

  it('reports potential savings for a dry run', () => {
    const summary = summarizeAttempts(
      [attempt({ mode: 'dry-run', outcome: 'DryRunSimulated', estimatedMonthlyCost: 16.43 })],
      { sessionId: 'test-session', mode: 'dry-run' }
    );

    const lines = formatExecutionSummary(summary);
    expect(lines).toContain('  Simulated: 1');
    expect(lines[lines.length - 1]).toBe('Potential monthly savings: $16.43 (estimate)');
  });
});
