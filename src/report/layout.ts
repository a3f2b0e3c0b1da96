/**
 * Per-kind report layout: file names, column headers and the mapping between
 * typed records and header-named cells.
 */

import type {
  LoadBalancerType,
  PublicAccessStatus,
  ResourceKind,
  ResourceRecord,
} from '@shared/types';

export interface KindReportLayout {
  file: string;
  title: string;
  utilizationHeader: string;
  columns: readonly string[];
}

export const REPORT_LAYOUT: Readonly<Record<ResourceKind, KindReportLayout>> = {
  Instance: {
    file: '01_instances.csv',
    title: 'Instances',
    utilizationHeader: 'AvgCpuPercent',
    columns: ['InstanceType', 'Platform'],
  },
  Volume: {
    file: '02_volumes.csv',
    title: 'Volumes',
    utilizationHeader: 'AvgOpsPerDay',
    columns: ['SizeGB', 'VolumeType', 'Iops', 'AvgReadOpsPerDay', 'AvgWriteOpsPerDay', 'Encrypted'],
  },
  Snapshot: {
    file: '03_snapshots.csv',
    title: 'Snapshots',
    utilizationHeader: 'Utilization',
    columns: ['SizeGB', 'Description', 'Encrypted'],
  },
  FloatingIP: {
    file: '04_floating_ips.csv',
    title: 'Floating IPs',
    utilizationHeader: 'Utilization',
    columns: ['PublicIp', 'NetworkInterfaceId'],
  },
  LoadBalancer: {
    file: '05_load_balancers.csv',
    title: 'Load balancers',
    utilizationHeader: 'AvgRequestsPerDay',
    columns: ['Type', 'Arn'],
  },
  ManagedDB: {
    file: '06_managed_databases.csv',
    title: 'Managed databases',
    utilizationHeader: 'AvgConnections',
    columns: ['InstanceClass', 'Engine', 'AllocatedStorageGB'],
  },
  ServerlessFunction: {
    file: '07_functions.csv',
    title: 'Serverless functions',
    utilizationHeader: 'AvgInvocationsPerDay',
    columns: ['Runtime', 'MemoryMB'],
  },
  NATGateway: {
    file: '08_nat_gateways.csv',
    title: 'NAT gateways',
    utilizationHeader: 'AvgBytesOutPerDay',
    columns: ['VpcId', 'SubnetId'],
  },
  ObjectBucket: {
    file: '09_object_buckets.csv',
    title: 'Object buckets',
    utilizationHeader: 'Utilization',
    columns: ['ObjectCount', 'SizeGB', 'Versioning', 'Encryption', 'PublicAccess'],
  },
};

export const LEADING_COLUMNS = [
  'Kind',
  'Region',
  'ResourceId',
  'Name',
  'State',
  'CreatedAt',
  'AgeDays',
] as const;

export const TRAILING_COLUMNS = ['AssociatedId', 'Tags', 'Recommendation', 'EstMonthlyCost'] as const;

/**
 * Full header row for a kind's report file.
 */
export function headerFor(kind: ResourceKind): string[] {
  const layout = REPORT_LAYOUT[kind];
  return [...LEADING_COLUMNS, layout.utilizationHeader, ...layout.columns, ...TRAILING_COLUMNS];
}

export function formatNumber(value: number | undefined): string {
  return value === undefined ? '' : String(value);
}

/**
 * Parse a numeric cell. Blank cells and provider sentinels ("N/A", "unknown")
 * become undefined.
 */
export function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function formatBoolean(value: boolean | undefined): string {
  return value === undefined ? '' : String(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return undefined;
}

function optional(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

const LOAD_BALANCER_TYPES: readonly LoadBalancerType[] = ['application', 'network', 'gateway', 'classic'];

export function parseLoadBalancerType(value: string | undefined): LoadBalancerType | undefined {
  const normalized = (value ?? '').trim().toLowerCase();
  return LOAD_BALANCER_TYPES.find((t) => t === normalized);
}

const PUBLIC_ACCESS_STATUSES: readonly PublicAccessStatus[] = ['Blocked', 'Partial', 'None', 'Unknown'];

function parsePublicAccess(value: string | undefined): PublicAccessStatus | undefined {
  const trimmed = (value ?? '').trim();
  return PUBLIC_ACCESS_STATUSES.find((status) => status === trimmed);
}

/**
 * Kind-specific cells of a record, keyed by header.
 */
export function kindCells(record: ResourceRecord): Record<string, string> {
  switch (record.kind) {
    case 'Instance':
      return { InstanceType: record.instanceType ?? '', Platform: record.platform ?? '' };
    case 'Volume':
      return {
        SizeGB: formatNumber(record.sizeGb),
        VolumeType: record.volumeType ?? '',
        Iops: formatNumber(record.iops),
        AvgReadOpsPerDay: formatNumber(record.readOpsPerDay),
        AvgWriteOpsPerDay: formatNumber(record.writeOpsPerDay),
        Encrypted: formatBoolean(record.encrypted),
      };
    case 'Snapshot':
      return {
        SizeGB: formatNumber(record.sizeGb),
        Description: record.description ?? '',
        Encrypted: formatBoolean(record.encrypted),
      };
    case 'FloatingIP':
      return { PublicIp: record.publicIp ?? '', NetworkInterfaceId: record.networkInterfaceId ?? '' };
    case 'LoadBalancer':
      return { Type: record.lbType, Arn: record.arn ?? '' };
    case 'ManagedDB':
      return {
        InstanceClass: record.instanceClass ?? '',
        Engine: record.engine ?? '',
        AllocatedStorageGB: formatNumber(record.allocatedStorageGb),
      };
    case 'ServerlessFunction':
      return { Runtime: record.runtime ?? '', MemoryMB: formatNumber(record.memoryMb) };
    case 'NATGateway':
      return { VpcId: record.vpcId ?? '', SubnetId: record.subnetId ?? '' };
    case 'ObjectBucket':
      return {
        ObjectCount: formatNumber(record.objectCount),
        SizeGB: formatNumber(record.sizeGb),
        Versioning: record.versioning ?? '',
        Encryption: record.encryption ?? '',
        PublicAccess: record.publicAccess ?? '',
      };
  }
}

/**
 * Fields shared by every kind, as read back from a report row.
 */
export interface CommonFields {
  region: string;
  id: string;
  label: string;
  state: string;
  createdAt?: Date;
  utilization?: number;
  tags: Record<string, string>;
  associatedId?: string;
}

/**
 * Rebuild a typed record from the common fields and a cell lookup.
 *
 * @returns undefined when a required kind-specific cell is invalid
 */
export function recordFromCells(
  kind: ResourceKind,
  common: CommonFields,
  cell: (header: string) => string | undefined
): ResourceRecord | undefined {
  switch (kind) {
    case 'Instance':
      return {
        kind,
        ...common,
        instanceType: optional(cell('InstanceType')),
        platform: optional(cell('Platform')),
      };
    case 'Volume':
      return {
        kind,
        ...common,
        sizeGb: parseNumber(cell('SizeGB')),
        volumeType: optional(cell('VolumeType')),
        iops: parseNumber(cell('Iops')),
        encrypted: parseBoolean(cell('Encrypted')),
        readOpsPerDay: parseNumber(cell('AvgReadOpsPerDay')),
        writeOpsPerDay: parseNumber(cell('AvgWriteOpsPerDay')),
      };
    case 'Snapshot':
      return {
        kind,
        ...common,
        sizeGb: parseNumber(cell('SizeGB')),
        description: optional(cell('Description')),
        encrypted: parseBoolean(cell('Encrypted')),
      };
    case 'FloatingIP':
      return {
        kind,
        ...common,
        publicIp: optional(cell('PublicIp')),
        networkInterfaceId: optional(cell('NetworkInterfaceId')),
      };
    case 'LoadBalancer': {
      const lbType = parseLoadBalancerType(cell('Type'));
      if (!lbType) return undefined;
      return { kind, ...common, lbType, arn: optional(cell('Arn')) };
    }
    case 'ManagedDB':
      return {
        kind,
        ...common,
        instanceClass: optional(cell('InstanceClass')),
        engine: optional(cell('Engine')),
        allocatedStorageGb: parseNumber(cell('AllocatedStorageGB')),
      };
    case 'ServerlessFunction':
      return {
        kind,
        ...common,
        runtime: optional(cell('Runtime')),
        memoryMb: parseNumber(cell('MemoryMB')),
      };
    case 'NATGateway':
      return {
        kind,
        ...common,
        vpcId: optional(cell('VpcId')),
        subnetId: optional(cell('SubnetId')),
      };
    case 'ObjectBucket':
      return {
        kind,
        ...common,
        objectCount: parseNumber(cell('ObjectCount')),
        sizeGb: parseNumber(cell('SizeGB')),
        versioning: optional(cell('Versioning')),
        encryption: optional(cell('Encryption')),
        publicAccess: parsePublicAccess(cell('PublicAccess')),
      };
  }
}
