import type { FloatingIpRecord } from '@shared/types';
import type { RuleDecision } from '@/classifier/types';

/**
 * Unassociated addresses are billed while doing nothing. Age is not considered:
 * the provider does not report when an address was allocated.
 */
export function classifyFloatingIp(record: FloatingIpRecord): RuleDecision {
  if (!record.associatedId && !record.networkInterfaceId) {
    return {
      disposition: 'DELETE',
      reason: 'Floating IP is unassociated (no instance or network interface)',
    };
  }
  return {
    disposition: 'KEEP',
    reason: `Associated with ${record.associatedId ?? record.networkInterfaceId}`,
  };
}
