import type { VolumeRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

export function classifyVolume(record: VolumeRecord, context: RuleContext): RuleDecision {
  if (record.state !== 'available') {
    const attachedTo = record.associatedId ? ` to ${record.associatedId}` : '';
    return { disposition: 'KEEP', reason: `Volume ${record.state}${attachedTo}` };
  }

  const minDays = context.thresholds.unattachedVolumeMinDays;
  const { ageDays } = context;

  if (ageDays === undefined) {
    return { disposition: 'REVIEW', reason: 'Unattached volume of unknown age' };
  }
  if (ageDays >= minDays) {
    return {
      disposition: 'DELETE',
      reason: `Unattached volume, ${ageDays} days old (threshold ${minDays} days)`,
    };
  }
  return {
    disposition: 'REVIEW',
    reason: `Unattached volume, ${ageDays} days old, below ${minDays} day threshold`,
  };
}
