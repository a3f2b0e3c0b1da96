/**
 * Default thresholds and per-kind deletion policy.
 */

import type { MetricWindows, ResourceKind, ThresholdConfig } from '@shared/types';

const DEFAULT_METRIC_WINDOW_DAYS = 30;

export const DEFAULT_METRIC_WINDOWS: MetricWindows = {
  Instance: DEFAULT_METRIC_WINDOW_DAYS,
  Volume: DEFAULT_METRIC_WINDOW_DAYS,
  Snapshot: DEFAULT_METRIC_WINDOW_DAYS,
  FloatingIP: DEFAULT_METRIC_WINDOW_DAYS,
  LoadBalancer: DEFAULT_METRIC_WINDOW_DAYS,
  ManagedDB: DEFAULT_METRIC_WINDOW_DAYS,
  ServerlessFunction: DEFAULT_METRIC_WINDOW_DAYS,
  NATGateway: DEFAULT_METRIC_WINDOW_DAYS,
  ObjectBucket: DEFAULT_METRIC_WINDOW_DAYS,
};

export const DEFAULT_THRESHOLDS: ThresholdConfig = Object.freeze({
  stoppedInstanceMinDays: 90,
  unattachedVolumeMinDays: 60,
  snapshotReviewMinDays: 90,
  snapshotDeleteMinDays: 365,
  cpuIdlePercent: 5,
  idleActivityMinDays: 7,
  idleFunctionMinDays: 90,
  emptyBucketMinDays: 180,
  idleActivityThreshold: 1,
  natIdleBytesThreshold: 1_000_000,
  nearlyEmptyBucketGb: 0.1,
  metricWindows: Object.freeze({ ...DEFAULT_METRIC_WINDOWS }),
});

export type ThresholdOverrides = Partial<Omit<ThresholdConfig, 'metricWindows'>> & {
  metricWindows?: Partial<MetricWindows>;
};

/**
 * Build a frozen threshold set from defaults and overrides.
 */
export function createThresholds(overrides: ThresholdOverrides = {}): ThresholdConfig {
  return Object.freeze({
    ...DEFAULT_THRESHOLDS,
    ...overrides,
    metricWindows: Object.freeze({
      ...DEFAULT_THRESHOLDS.metricWindows,
      ...overrides.metricWindows,
    }),
  });
}

/**
 * States in which a resource of each kind may be deleted.
 */
export const DELETABLE_STATES: Readonly<Record<ResourceKind, readonly string[]>> = {
  Instance: ['stopped'],
  Volume: ['available'],
  Snapshot: ['completed'],
  FloatingIP: ['unassociated'],
  LoadBalancer: ['active'],
  ManagedDB: ['available', 'stopped'],
  ServerlessFunction: ['active', 'inactive'],
  NATGateway: ['available'],
  ObjectBucket: ['empty'],
};

/**
 * States meaning the resource is already gone or going away.
 */
export const REMOVED_STATES: ReadonlySet<string> = new Set([
  'terminated',
  'shutting-down',
  'deleted',
  'deleting',
]);

/**
 * Minimum age (days) the executor requires before deleting a resource of this
 * kind, when no override is given.
 */
export function minimumAgeForKind(kind: ResourceKind, thresholds: ThresholdConfig): number {
  switch (kind) {
    case 'Instance':
      return thresholds.stoppedInstanceMinDays;
    case 'Volume':
      return thresholds.unattachedVolumeMinDays;
    case 'Snapshot':
      return thresholds.snapshotDeleteMinDays;
    case 'LoadBalancer':
      return thresholds.idleActivityMinDays;
    case 'ServerlessFunction':
      return thresholds.idleFunctionMinDays;
    case 'ObjectBucket':
      return thresholds.emptyBucketMinDays;
    case 'FloatingIP':
    case 'ManagedDB':
    case 'NATGateway':
      return 0;
  }
}
