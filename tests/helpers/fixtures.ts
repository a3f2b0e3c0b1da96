/**
 * Record builders for tests.
 *
 * Every builder returns a minimal valid record of its kind; tests override
 * only the fields they care about.
 */

import type {
  ClassifiedResource,
  Disposition,
  FloatingIpRecord,
  InstanceRecord,
  LoadBalancerRecord,
  ManagedDbRecord,
  NatGatewayRecord,
  ObjectBucketRecord,
  ResourceRecord,
  ServerlessFunctionRecord,
  SnapshotRecord,
  VolumeRecord,
} from '@shared/types';

export const NOW = new Date('2026-03-01T00:00:00.000Z');

const MS_PER_DAY = 86_400_000;

/**
 * A timestamp exactly `days` whole days before `from`.
 */
export function daysAgo(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * MS_PER_DAY);
}

type Overrides<R> = Partial<Omit<R, 'kind'>>;

export function instance(overrides: Overrides<InstanceRecord> = {}): InstanceRecord {
  return {
    kind: 'Instance',
    region: 'us-east-1',
    id: 'i-0abc123',
    label: 'build-agent',
    state: 'stopped',
    tags: {},
    instanceType: 't3.micro',
    ...overrides,
  };
}

export function volume(overrides: Overrides<VolumeRecord> = {}): VolumeRecord {
  return {
    kind: 'Volume',
    region: 'us-east-1',
    id: 'vol-0abc123',
    label: 'scratch',
    state: 'available',
    tags: {},
    sizeGb: 100,
    volumeType: 'gp3',
    ...overrides,
  };
}

export function snapshot(overrides: Overrides<SnapshotRecord> = {}): SnapshotRecord {
  return {
    kind: 'Snapshot',
    region: 'us-east-1',
    id: 'snap-0abc123',
    label: 'nightly',
    state: 'completed',
    tags: {},
    sizeGb: 20,
    ...overrides,
  };
}

export function floatingIp(overrides: Overrides<FloatingIpRecord> = {}): FloatingIpRecord {
  return {
    kind: 'FloatingIP',
    region: 'us-east-1',
    id: 'eipalloc-0abc123',
    label: '203.0.113.10',
    state: 'unassociated',
    tags: {},
    publicIp: '203.0.113.10',
    ...overrides,
  };
}

export function loadBalancer(overrides: Overrides<LoadBalancerRecord> = {}): LoadBalancerRecord {
  return {
    kind: 'LoadBalancer',
    region: 'us-east-1',
    id: 'arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/web/0abc123',
    label: 'web',
    state: 'active',
    tags: {},
    lbType: 'application',
    arn: 'arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/web/0abc123',
    ...overrides,
  };
}

export function managedDb(overrides: Overrides<ManagedDbRecord> = {}): ManagedDbRecord {
  return {
    kind: 'ManagedDB',
    region: 'us-east-1',
    id: 'reports-db',
    label: 'reports-db',
    state: 'available',
    tags: {},
    instanceClass: 'db.t3.micro',
    engine: 'postgres',
    ...overrides,
  };
}

export function serverlessFunction(
  overrides: Overrides<ServerlessFunctionRecord> = {}
): ServerlessFunctionRecord {
  return {
    kind: 'ServerlessFunction',
    region: 'us-east-1',
    id: 'thumbnailer',
    label: 'thumbnailer',
    state: 'active',
    tags: {},
    runtime: 'nodejs20.x',
    memoryMb: 128,
    ...overrides,
  };
}

export function natGateway(overrides: Overrides<NatGatewayRecord> = {}): NatGatewayRecord {
  return {
    kind: 'NATGateway',
    region: 'us-east-1',
    id: 'nat-0abc123',
    label: 'egress',
    state: 'available',
    tags: {},
    vpcId: 'vpc-0abc123',
    subnetId: 'subnet-0abc123',
    ...overrides,
  };
}

export function objectBucket(overrides: Overrides<ObjectBucketRecord> = {}): ObjectBucketRecord {
  return {
    kind: 'ObjectBucket',
    region: 'us-east-1',
    id: 'example-logs-bucket',
    label: 'example-logs-bucket',
    state: 'empty',
    tags: {},
    objectCount: 0,
    sizeGb: 0,
    ...overrides,
  };
}

/**
 * Pair a record with a verdict, as read back from a report.
 */
export function classified(
  record: ResourceRecord,
  disposition: Disposition = 'DELETE',
  estimatedMonthlyCost?: number
): ClassifiedResource {
  return {
    record,
    verdict: { disposition, reason: 'test fixture', estimatedMonthlyCost },
  };
}
