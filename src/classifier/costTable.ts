/**
 * Static monthly cost estimates.
 *
 * Rough on-demand list prices (USD, us-east-1, 730 hours/month). These are
 * estimates for ranking cleanup candidates, not billing figures.
 */

import type {
  InstanceRecord,
  LoadBalancerType,
  ManagedDbRecord,
  ResourceRecord,
  VolumeRecord,
} from '@shared/types';

/**
 * Where an estimate came from.
 *
 * - table: the descriptor was found in the lookup table
 * - default: the descriptor was unrecognized and the kind's default was used
 * - unknown: not enough data to estimate
 */
export type CostBasis = 'table' | 'default' | 'unknown';

export interface CostEstimate {
  amount?: number;
  basis: CostBasis;

  /**
   * Descriptor used for the lookup (instance type, volume type, ...).
   */
  descriptor?: string;
}

export const INSTANCE_MONTHLY_COST: Readonly<Record<string, number>> = {
  't2.micro': 8.5,
  't2.small': 17,
  't2.medium': 34,
  't3.micro': 7.5,
  't3.small': 15,
  't3.medium': 30,
  'm5.large': 70,
  'm5.xlarge': 140,
};

/**
 * Used for running instances whose type is not in {@link INSTANCE_MONTHLY_COST}.
 */
export const DEFAULT_INSTANCE_MONTHLY_COST = 50;

/**
 * Per GB-month storage rate by volume type.
 */
export const VOLUME_GB_MONTH_RATE: Readonly<Record<string, number>> = {
  gp2: 0.1,
  gp3: 0.08,
  io1: 0.125,
  io2: 0.125,
  st1: 0.045,
  sc1: 0.025,
  standard: 0.05,
};

export const DEFAULT_VOLUME_GB_MONTH_RATE = 0.1;

/**
 * Per provisioned IOPS-month rate for io1/io2 volumes.
 */
export const PROVISIONED_IOPS_MONTH_RATE = 0.065;

export const SNAPSHOT_GB_MONTH_RATE = 0.05;

export const UNASSOCIATED_FLOATING_IP_MONTHLY_COST = 3.6;

export const LOAD_BALANCER_MONTHLY_COST: Readonly<Record<LoadBalancerType, number>> = {
  application: 16.43,
  network: 16.43,
  gateway: 9.13,
  classic: 18.25,
};

export const DB_INSTANCE_MONTHLY_COST: Readonly<Record<string, number>> = {
  'db.t2.micro': 15,
  'db.t2.small': 30,
  'db.t3.micro': 15,
  'db.t3.small': 30,
  'db.t3.medium': 60,
  'db.m5.large': 140,
};

export const DEFAULT_DB_INSTANCE_MONTHLY_COST = 100;

/**
 * Idle functions cost close to nothing; this is an upper-bound placeholder.
 */
export const SERVERLESS_FUNCTION_MONTHLY_COST = 0.5;

export const NAT_GATEWAY_MONTHLY_COST = 32.4;

export const BUCKET_GB_MONTH_RATE = 0.023;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function lookup(
  table: Readonly<Record<string, number>>,
  descriptor: string | undefined,
  fallback: number
): CostEstimate {
  if (descriptor && Object.prototype.hasOwnProperty.call(table, descriptor)) {
    return { amount: table[descriptor], basis: 'table', descriptor };
  }
  return { amount: fallback, basis: 'default', descriptor };
}

function instanceCost(record: InstanceRecord): CostEstimate {
  if (record.state === 'stopped') {
    // Compute charges stop; attached volumes keep billing under their own rows.
    return { amount: 0, basis: 'table', descriptor: 'stopped' };
  }
  if (record.state !== 'running') {
    return { basis: 'unknown', descriptor: record.instanceType };
  }
  return lookup(INSTANCE_MONTHLY_COST, record.instanceType, DEFAULT_INSTANCE_MONTHLY_COST);
}

function volumeCost(record: VolumeRecord): CostEstimate {
  if (record.sizeGb === undefined) {
    return { basis: 'unknown', descriptor: record.volumeType };
  }
  const known =
    record.volumeType !== undefined &&
    Object.prototype.hasOwnProperty.call(VOLUME_GB_MONTH_RATE, record.volumeType);
  const rate = known && record.volumeType ? VOLUME_GB_MONTH_RATE[record.volumeType] : DEFAULT_VOLUME_GB_MONTH_RATE;

  let amount = record.sizeGb * rate;
  if ((record.volumeType === 'io1' || record.volumeType === 'io2') && record.iops !== undefined) {
    amount += record.iops * PROVISIONED_IOPS_MONTH_RATE;
  }
  return { amount: round2(amount), basis: known ? 'table' : 'default', descriptor: record.volumeType };
}

function dbCost(record: ManagedDbRecord): CostEstimate {
  return lookup(DB_INSTANCE_MONTHLY_COST, record.instanceClass, DEFAULT_DB_INSTANCE_MONTHLY_COST);
}

/**
 * Estimate the monthly cost of a resource from static tables.
 */
export function estimateMonthlyCost(record: ResourceRecord): CostEstimate {
  switch (record.kind) {
    case 'Instance':
      return instanceCost(record);
    case 'Volume':
      return volumeCost(record);
    case 'Snapshot':
      return record.sizeGb === undefined
        ? { basis: 'unknown' }
        : { amount: round2(record.sizeGb * SNAPSHOT_GB_MONTH_RATE), basis: 'table' };
    case 'FloatingIP': {
      const unassociated = !record.associatedId && !record.networkInterfaceId;
      return {
        amount: unassociated ? UNASSOCIATED_FLOATING_IP_MONTHLY_COST : 0,
        basis: 'table',
        descriptor: unassociated ? 'unassociated' : 'associated',
      };
    }
    case 'LoadBalancer':
      return {
        amount: LOAD_BALANCER_MONTHLY_COST[record.lbType],
        basis: 'table',
        descriptor: record.lbType,
      };
    case 'ManagedDB':
      return dbCost(record);
    case 'ServerlessFunction':
      return { amount: SERVERLESS_FUNCTION_MONTHLY_COST, basis: 'table' };
    case 'NATGateway':
      return { amount: NAT_GATEWAY_MONTHLY_COST, basis: 'table' };
    case 'ObjectBucket':
      return record.sizeGb === undefined
        ? { basis: 'unknown' }
        : { amount: round2(record.sizeGb * BUCKET_GB_MONTH_RATE), basis: 'table' };
  }
}

/**
 * Label appended to every verdict reason so readers know the figure is an estimate.
 *
 * @example "est. $3.60/month"
 * @example "est. $50.00/month, default rate for unlisted m6i.large"
 * @example "cost unknown"
 */
export function formatCostLabel(estimate: CostEstimate): string {
  if (estimate.amount === undefined) {
    return 'cost unknown';
  }
  const amount = `est. $${estimate.amount.toFixed(2)}/month`;
  if (estimate.basis === 'default') {
    return `${amount}, default rate for unlisted ${estimate.descriptor ?? 'type'}`;
  }
  return amount;
}
