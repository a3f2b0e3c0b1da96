import type { ManagedDbRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

/**
 * A stopped database is REVIEW before the idle-connection rule is looked at:
 * its connection count is zero by construction.
 */
export function classifyManagedDb(record: ManagedDbRecord, context: RuleContext): RuleDecision {
  const { thresholds, windowDays } = context;

  if (record.state === 'stopped') {
    return { disposition: 'REVIEW', reason: 'Database is stopped' };
  }
  if (record.state !== 'available') {
    return { disposition: 'KEEP', reason: `Database is ${record.state}` };
  }
  if (record.utilization === undefined) {
    return { disposition: 'KEEP', reason: 'Connection count unavailable' };
  }

  const connections = `Average ${record.utilization.toFixed(2)} connections over ${windowDays} days`;
  if (record.utilization < thresholds.idleActivityThreshold) {
    return { disposition: 'DELETE', reason: `Idle database: ${connections}` };
  }
  return { disposition: 'KEEP', reason: connections };
}
