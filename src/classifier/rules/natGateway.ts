import type { NatGatewayRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';

/**
 * NAT gateways are never DELETE candidates: removing one breaks egress for a
 * whole subnet. Low traffic only earns a REVIEW.
 */
export function classifyNatGateway(record: NatGatewayRecord, context: RuleContext): RuleDecision {
  const { thresholds, windowDays } = context;

  if (record.state !== 'available') {
    return { disposition: 'KEEP', reason: `NAT gateway is ${record.state}` };
  }
  if (record.utilization === undefined) {
    return { disposition: 'KEEP', reason: 'Traffic unavailable' };
  }

  const traffic = `Average ${Math.round(record.utilization)} bytes out/day over ${windowDays} days`;
  if (record.utilization < thresholds.natIdleBytesThreshold) {
    return {
      disposition: 'REVIEW',
      reason: `Low traffic: ${traffic}, below ${thresholds.natIdleBytesThreshold}`,
    };
  }
  return { disposition: 'KEEP', reason: traffic };
}
