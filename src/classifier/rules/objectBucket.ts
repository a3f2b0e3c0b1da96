import type { ObjectBucketRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

export function classifyObjectBucket(record: ObjectBucketRecord, context: RuleContext): RuleDecision {
  const { emptyBucketMinDays, nearlyEmptyBucketGb } = context.thresholds;
  const { ageDays } = context;

  // A listing that saw keys outranks a zero count.
  if (record.objectCount === 0 && record.state !== 'not-empty') {
    if (ageDays === undefined) {
      return { disposition: 'REVIEW', reason: 'Empty bucket of unknown age' };
    }
    if (ageDays >= emptyBucketMinDays) {
      return {
        disposition: 'DELETE',
        reason: `Empty bucket, ${ageDays} days old (threshold ${emptyBucketMinDays} days)`,
      };
    }
    return {
      disposition: 'REVIEW',
      reason: `Empty bucket, ${ageDays} days old, below ${emptyBucketMinDays} day threshold`,
    };
  }

  if (
    record.sizeGb !== undefined &&
    record.sizeGb < nearlyEmptyBucketGb &&
    ageDays !== undefined &&
    ageDays >= emptyBucketMinDays
  ) {
    return {
      disposition: 'REVIEW',
      reason: `Nearly empty bucket (${record.sizeGb} GB), ${ageDays} days old`,
    };
  }

  if (record.objectCount === undefined) {
    return { disposition: 'KEEP', reason: 'Object count unavailable' };
  }
  return { disposition: 'KEEP', reason: `${record.objectCount} objects` };
}
