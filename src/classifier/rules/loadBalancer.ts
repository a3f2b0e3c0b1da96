import type { LoadBalancerRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

export function classifyLoadBalancer(
  record: LoadBalancerRecord,
  context: RuleContext
): RuleDecision {
  const { thresholds, ageDays, windowDays } = context;
  const unit = record.lbType === 'network' || record.lbType === 'gateway' ? 'flows' : 'requests';

  if (record.state !== 'active') {
    return { disposition: 'KEEP', reason: `Load balancer is ${record.state}` };
  }
  if (record.utilization === undefined) {
    return { disposition: 'KEEP', reason: `Average ${unit} unavailable` };
  }

  const activity = `Average ${record.utilization.toFixed(2)} ${unit}/day over ${windowDays} days`;
  if (record.utilization >= thresholds.idleActivityThreshold) {
    return { disposition: 'KEEP', reason: activity };
  }
  if (ageDays === undefined) {
    return { disposition: 'KEEP', reason: `${activity}, age unknown` };
  }
  if (ageDays >= thresholds.idleActivityMinDays) {
    return {
      disposition: 'DELETE',
      reason: `Idle load balancer: ${activity}, ${ageDays} days old (threshold ${thresholds.idleActivityMinDays} days)`,
    };
  }
  return {
    disposition: 'KEEP',
    reason: `${activity}, only ${ageDays} days old`,
  };
}
