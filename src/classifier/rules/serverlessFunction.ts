import type { ServerlessFunctionRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

export function classifyServerlessFunction(
  record: ServerlessFunctionRecord,
  context: RuleContext
): RuleDecision {
  const { thresholds, ageDays, windowDays } = context;

  if (record.utilization === undefined) {
    return { disposition: 'KEEP', reason: 'Invocation count unavailable' };
  }

  const invocations = `Average ${record.utilization.toFixed(2)} invocations/day over ${windowDays} days`;
  if (record.utilization >= thresholds.idleActivityThreshold) {
    return { disposition: 'KEEP', reason: invocations };
  }
  if (ageDays === undefined) {
    return { disposition: 'KEEP', reason: `${invocations}, last modified date unknown` };
  }
  if (ageDays >= thresholds.idleFunctionMinDays) {
    return {
      disposition: 'DELETE',
      reason: `Unused function: ${invocations}, last modified ${ageDays} days ago (threshold ${thresholds.idleFunctionMinDays} days)`,
    };
  }
  return {
    disposition: 'KEEP',
    reason: `${invocations}, modified ${ageDays} days ago`,
  };
}
