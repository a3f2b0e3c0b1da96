import type { ResourceKind } from '@shared/types';
import type { Collector } from '@/inventory/types';
import {
  collectAddresses,
  collectInstances,
  collectNatGateways,
  collectSnapshots,
  collectVolumes,
} from './ec2';
import { collectFunctions } from './lambda';
import { collectLoadBalancers } from './loadBalancers';
import { collectDbInstances } from './rds';

export type RegionalKind = Exclude<ResourceKind, 'ObjectBucket'>;

/**
 * Collectors for the kinds listed per region. Buckets are listed globally.
 */
export const REGIONAL_COLLECTORS: Readonly<Record<RegionalKind, Collector>> = {
  Instance: collectInstances,
  Volume: collectVolumes,
  Snapshot: collectSnapshots,
  FloatingIP: collectAddresses,
  LoadBalancer: collectLoadBalancers,
  ManagedDB: collectDbInstances,
  ServerlessFunction: collectFunctions,
  NATGateway: collectNatGateways,
};

export { collectBuckets, normalizeBucketRegion } from './s3';
export type { BucketCollectorOptions } from './s3';
export { loadBalancerDimension } from './loadBalancers';
export { parseLastModified } from './lambda';
