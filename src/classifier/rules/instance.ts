import type { InstanceRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

/**
 * Stopped instances past the age threshold are DELETE; running instances with
 * low average CPU are REVIEW.
 */
export function classifyInstance(record: InstanceRecord, context: RuleContext): RuleDecision {
  const { thresholds, ageDays, windowDays } = context;

  if (record.state === 'stopped') {
    const minDays = thresholds.stoppedInstanceMinDays;
    if (ageDays === undefined) {
      return { disposition: 'KEEP', reason: 'Stopped instance of unknown age' };
    }
    if (ageDays >= minDays) {
      return {
        disposition: 'DELETE',
        reason: `Stopped instance, ${ageDays} days old (threshold ${minDays} days)`,
      };
    }
    return {
      disposition: 'KEEP',
      reason: `Stopped instance, ${ageDays} days old, below ${minDays} day threshold`,
    };
  }

  if (record.state === 'running') {
    if (record.utilization === undefined) {
      return { disposition: 'KEEP', reason: 'Running, CPU utilization unavailable' };
    }
    if (record.utilization < thresholds.cpuIdlePercent) {
      return {
        disposition: 'REVIEW',
        reason: `Average CPU ${record.utilization.toFixed(1)}% over ${windowDays} days, below ${thresholds.cpuIdlePercent}%`,
      };
    }
    return {
      disposition: 'KEEP',
      reason: `Running, average CPU ${record.utilization.toFixed(1)}% over ${windowDays} days`,
    };
  }

  return { disposition: 'KEEP', reason: `Instance is ${record.state}` };
}
