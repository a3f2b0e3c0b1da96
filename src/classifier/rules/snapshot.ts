import type { SnapshotRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

export function classifySnapshot(record: SnapshotRecord, context: RuleContext): RuleDecision {
  const { snapshotDeleteMinDays, snapshotReviewMinDays } = context.thresholds;
  const { ageDays } = context;

  if (record.state !== 'completed') {
    return { disposition: 'KEEP', reason: `Snapshot is ${record.state}` };
  }
  if (ageDays === undefined) {
    return { disposition: 'KEEP', reason: 'Snapshot of unknown age' };
  }
  if (ageDays >= snapshotDeleteMinDays) {
    return {
      disposition: 'DELETE',
      reason: `Snapshot ${ageDays} days old (delete threshold ${snapshotDeleteMinDays} days)`,
    };
  }
  if (ageDays >= snapshotReviewMinDays) {
    return {
      disposition: 'REVIEW',
      reason: `Snapshot ${ageDays} days old (review threshold ${snapshotReviewMinDays} days)`,
    };
  }
  return { disposition: 'KEEP', reason: `Recent snapshot, ${ageDays} days old` };
}
