import type { ResourceRecord } from '@shared/types';
import type { RuleContext, RuleDecision } from '@/classifier/types';
import { classifyFloatingIp } from './floatingIp';
import { classifyInstance } from './instance';
import { classifyLoadBalancer } from './loadBalancer';
import { classifyManagedDb } from './managedDb';
import { classifyNatGateway } from './natGateway';
import { classifyObjectBucket } from './objectBucket';
import { classifyServerlessFunction } from './serverlessFunction';
import { classifySnapshot } from './snapshot';
import { classifyVolume } from './volume';

/**
 * Dispatch a record to the rule for its kind.
 */
export function evaluateRule(record: ResourceRecord, context: RuleContext): RuleDecision {
  switch (record.kind) {
    case 'Instance':
      return classifyInstance(record, context);
    case 'Volume':
      return classifyVolume(record, context);
    case 'Snapshot':
      return classifySnapshot(record, context);
    case 'FloatingIP':
      return classifyFloatingIp(record);
    case 'LoadBalancer':
      return classifyLoadBalancer(record, context);
    case 'ManagedDB':
      return classifyManagedDb(record, context);
    case 'ServerlessFunction':
      return classifyServerlessFunction(record, context);
    case 'NATGateway':
      return classifyNatGateway(record, context);
    case 'ObjectBucket':
      return classifyObjectBucket(record, context);
  }
}

export {
  classifyFloatingIp,
  classifyInstance,
  classifyLoadBalancer,
  classifyManagedDb,
  classifyNatGateway,
  classifyObjectBucket,
  classifyServerlessFunction,
  classifySnapshot,
  classifyVolume,
};
