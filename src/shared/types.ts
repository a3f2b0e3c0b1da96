/**
 * Core type definitions for cloud-sweep.
 *
 * Centralizes shared types to avoid circular dependencies between the
 * inventory, classifier, report and executor modules.
 */

/**
 * Resource kinds covered by an audit.
 */
export type ResourceKind =
  | 'Instance'
  | 'Volume'
  | 'Snapshot'
  | 'FloatingIP'
  | 'LoadBalancer'
  | 'ManagedDB'
  | 'ServerlessFunction'
  | 'NATGateway'
  | 'ObjectBucket';

/**
 * All resource kinds, in report order.
 */
export const RESOURCE_KINDS: readonly ResourceKind[] = [
  'Instance',
  'Volume',
  'Snapshot',
  'FloatingIP',
  'LoadBalancer',
  'ManagedDB',
  'ServerlessFunction',
  'NATGateway',
  'ObjectBucket',
];

/**
 * Fields every observed resource carries.
 *
 * Records are read-only snapshots of provider state taken during one scan.
 * `id` + `kind` + `region` is unique within a scan.
 */
interface BaseRecord {
  region: string;

  /**
   * Provider-assigned identifier (instance id, allocation id, bucket name, ...).
   */
  id: string;

  /**
   * Human identifying label (Name tag, public IP, load balancer name, ...).
   */
  label: string;

  /**
   * Provider lifecycle state, lower-cased (e.g. "running", "available", "in-use").
   */
  state: string;

  /**
   * Creation (or, for functions, last modification) time. Undefined when unknown.
   */
  createdAt?: Date;

  /**
   * Kind-specific trailing-window average (CPU %, requests, connections,
   * invocations, bytes out). Undefined when the metric is unavailable.
   */
  utilization?: number;

  tags: Record<string, string>;

  /**
   * Back-reference to the resource this one is attached to (instance of a
   * volume, source volume of a snapshot, instance of a floating IP).
   */
  associatedId?: string;
}

export interface InstanceRecord extends BaseRecord {
  kind: 'Instance';
  instanceType?: string;
  platform?: string;
}

/**
 * A volume's utilization is its read plus write operations per day, known
 * only when both counters are.
 */
export interface VolumeRecord extends BaseRecord {
  kind: 'Volume';
  sizeGb?: number;
  volumeType?: string;
  iops?: number;
  encrypted?: boolean;
  readOpsPerDay?: number;
  writeOpsPerDay?: number;
}

export interface SnapshotRecord extends BaseRecord {
  kind: 'Snapshot';
  sizeGb?: number;
  description?: string;
  encrypted?: boolean;
}

export interface FloatingIpRecord extends BaseRecord {
  kind: 'FloatingIP';
  publicIp?: string;
  networkInterfaceId?: string;
}

export type LoadBalancerType = 'application' | 'network' | 'gateway' | 'classic';

export interface LoadBalancerRecord extends BaseRecord {
  kind: 'LoadBalancer';
  lbType: LoadBalancerType;

  /**
   * ARN for ELBv2 load balancers. Classic load balancers are addressed by name.
   */
  arn?: string;
}

export interface ManagedDbRecord extends BaseRecord {
  kind: 'ManagedDB';
  instanceClass?: string;
  engine?: string;
  allocatedStorageGb?: number;
}

export interface ServerlessFunctionRecord extends BaseRecord {
  kind: 'ServerlessFunction';
  runtime?: string;
  memoryMb?: number;
}

export interface NatGatewayRecord extends BaseRecord {
  kind: 'NATGateway';
  vpcId?: string;
  subnetId?: string;
}

/**
 * Public access block coverage of a bucket: all four flags set, some, none,
 * or not readable.
 */
export type PublicAccessStatus = 'Blocked' | 'Partial' | 'None' | 'Unknown';

export interface ObjectBucketRecord extends BaseRecord {
  kind: 'ObjectBucket';
  objectCount?: number;
  sizeGb?: number;

  /**
   * "Enabled", "Suspended", "Disabled" (never enabled) or "Unknown".
   */
  versioning?: string;

  /**
   * Default encryption algorithm ("AES256", "aws:kms", ...), "None" or "Unknown".
   */
  encryption?: string;

  publicAccess?: PublicAccessStatus;
}

/**
 * One cloud resource observed during a scan.
 */
export type ResourceRecord =
  | InstanceRecord
  | VolumeRecord
  | SnapshotRecord
  | FloatingIpRecord
  | LoadBalancerRecord
  | ManagedDbRecord
  | ServerlessFunctionRecord
  | NatGatewayRecord
  | ObjectBucketRecord;

/**
 * Narrow the record union to a single kind.
 */
export type RecordOfKind<K extends ResourceKind> = Extract<ResourceRecord, { kind: K }>;

/**
 * Classification outcome.
 */
export type Disposition = 'DELETE' | 'REVIEW' | 'KEEP' | 'IGNORE';

/**
 * Classification result attached to a record.
 */
export interface Verdict {
  disposition: Disposition;

  /**
   * Which rule fired and with what threshold, ending with the cost estimate label.
   */
  reason: string;

  /**
   * Estimated monthly cost in account currency. Undefined when unknown.
   */
  estimatedMonthlyCost?: number;
}

/**
 * A record paired with its verdict; the unit passed from classifier to report
 * and from report to executor.
 */
export interface ClassifiedResource {
  record: ResourceRecord;
  verdict: Verdict;
}

/**
 * Trailing metric window in days, per kind.
 */
export type MetricWindows = Record<ResourceKind, number>;

/**
 * Thresholds driving classification and the executor's age gate.
 *
 * Immutable for the duration of a run.
 */
export interface ThresholdConfig {
  /**
   * Stopped instances at least this old are DELETE candidates.
   */
  stoppedInstanceMinDays: number;

  /**
   * Unattached volumes at least this old are DELETE candidates; younger ones are REVIEW.
   */
  unattachedVolumeMinDays: number;

  snapshotReviewMinDays: number;
  snapshotDeleteMinDays: number;

  /**
   * Running instances below this average CPU % are REVIEW candidates.
   */
  cpuIdlePercent: number;

  /**
   * Minimum age of an idle load balancer before it is a DELETE candidate.
   */
  idleActivityMinDays: number;

  /**
   * Minimum age (since last modification) of an idle function before it is a DELETE candidate.
   */
  idleFunctionMinDays: number;

  emptyBucketMinDays: number;

  /**
   * Activity below this average (requests, connections, invocations) counts as idle.
   */
  idleActivityThreshold: number;

  /**
   * NAT gateways below this average bytes out are REVIEW candidates.
   */
  natIdleBytesThreshold: number;

  /**
   * Old buckets smaller than this are REVIEW candidates.
   */
  nearlyEmptyBucketGb: number;

  metricWindows: MetricWindows;
}

/**
 * Run modes of the deletion executor. Selected once per run.
 *
 * - dry-run: every gate runs, the destructive action is simulated (default)
 * - interactive: live, with a per-resource confirmation
 * - automated: live, no per-resource confirmation
 */
export type RunMode = 'dry-run' | 'interactive' | 'automated';

export type ProtectionState =
  | 'Unprotected'
  | 'ProtectedByTag'
  | 'ProtectedByAge'
  | 'ProtectedByState';

export type AttemptOutcome = 'Skipped' | 'DryRunSimulated' | 'Succeeded' | 'Failed';

/**
 * Executor step that decided a Skipped outcome.
 */
export type SkipGate = 'state' | 'age' | 'tag' | 'confirmation' | 'quit';

/**
 * Executor step that produced a Failed outcome.
 */
export type FailureStage = 'backup' | 'destroy';

/**
 * One resource processed by the executor.
 *
 * Terminal once `outcome` is set; appended to the audit trail exactly once and
 * never updated afterwards.
 */
export interface DeletionAttempt {
  sessionId: string;

  /**
   * 1-based position in the run.
   */
  sequence: number;

  mode: RunMode;

  /**
   * The record being processed. Read, never mutated.
   */
  record: ResourceRecord;

  /**
   * Taken from the classifier row, never re-estimated.
   */
  estimatedMonthlyCost?: number;

  protectionState: ProtectionState;
  backupRef?: string;
  outcome: AttemptOutcome;

  /**
   * Human-readable explanation of the outcome.
   */
  detail: string;

  skipGate?: SkipGate;
  failureStage?: FailureStage;
  failureReason?: string;

  /**
   * Synthetic identifier produced by a dry-run action.
   */
  simulatedActionId?: string;

  startedAt: string;
  finishedAt: string;
}

/**
 * Options selected once per executor run.
 */
export interface ExecutorOptions {
  mode: RunMode;
  backupBeforeDelete: boolean;

  /**
   * "Key=Value" (exact match) or "Key" (tag presence).
   */
  protectTagPatterns: string[];

  /**
   * Overrides the per-kind minimum age of the age gate.
   */
  minAgeDaysOverride?: number;

  /**
   * Stop intake after this many attempts.
   */
  maxResourcesThisRun?: number;
}

/**
 * Why the executor stopped taking resources before the end of its input.
 */
export type StopReason = 'user-quit' | 'max-resources';

/**
 * Final tally of a run, folded from its attempts.
 */
export interface ExecutionSummary {
  sessionId: string;
  mode: RunMode;
  total: number;
  skipped: number;
  dryRunSimulated: number;
  succeeded: number;
  failed: number;
  protectedByTag: number;
  skippedByState: number;
  skippedByAge: number;
  declinedByUser: number;
  backupFailures: number;
  destroyFailures: number;

  /**
   * Items left untouched because intake stopped early.
   */
  notProcessed: number;

  stopReason?: StopReason;

  /**
   * Sum of estimated monthly cost over Succeeded and DryRunSimulated attempts.
   */
  estimatedMonthlySavings: number;
}

/**
 * Result of a confirmed backup.
 */
export interface BackupResult {
  ref: string;
  type: 'machine-image' | 'volume-snapshot' | 'db-snapshot' | 'config-export';

  /**
   * Exported resource configuration, for config-export backups. JSON-serializable.
   */
  configuration?: Record<string, unknown>;
}
