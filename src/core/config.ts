/**
 * Configuration loader for cloud-sweep.
 *
 * Loads YAML configuration from a local file or from AWS Systems Manager (SSM)
 * Parameter Store, validates the structure, and caches the result.
 */

import { readFile } from 'node:fs/promises';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import { createThresholds } from '@/core/thresholds';
import { RESOURCE_KINDS } from '@shared/types';
import type { ExecutorOptions, ResourceKind, RunMode, ThresholdConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cloud-sweep:config');

const KIND_VALUES = [
  'Instance',
  'Volume',
  'Snapshot',
  'FloatingIP',
  'LoadBalancer',
  'ManagedDB',
  'ServerlessFunction',
  'NATGateway',
  'ObjectBucket',
] as const satisfies readonly ResourceKind[];

const days = z.number().int().nonnegative();
const windowDays = z.number().int().positive().optional();

const ThresholdsSchema = z
  .object({
    stopped_instance_min_days: days.default(90),
    unattached_volume_min_days: days.default(60),
    snapshot_review_min_days: days.default(90),
    snapshot_delete_min_days: days.default(365),
    cpu_idle_percent: z.number().min(0).max(100).default(5),
    idle_activity_min_days: days.default(7),
    idle_function_min_days: days.default(90),
    empty_bucket_min_days: days.default(180),
    idle_activity_threshold: z.number().nonnegative().default(1),
    nat_idle_bytes_threshold: z.number().nonnegative().default(1_000_000),
    nearly_empty_bucket_gb: z.number().nonnegative().default(0.1),
  })
  .refine((t) => t.snapshot_delete_min_days >= t.snapshot_review_min_days, {
    message: 'snapshot_delete_min_days must not be less than snapshot_review_min_days',
    path: ['snapshot_delete_min_days'],
  });

const MetricWindowsSchema = z.object({
  Instance: windowDays,
  Volume: windowDays,
  Snapshot: windowDays,
  FloatingIP: windowDays,
  LoadBalancer: windowDays,
  ManagedDB: windowDays,
  ServerlessFunction: windowDays,
  NATGateway: windowDays,
  ObjectBucket: windowDays,
});

const CleanupSchema = z.object({
  protect_tags: z.array(z.string()).default(['DoNotDelete=true']),
  backup_before_delete: z.boolean().default(false),
  min_age_days: days.optional(),
  max_resources: z.number().int().positive().optional(),
  backup_wait: z
    .object({
      max_attempts: z.number().int().positive().default(40),
      delay_seconds: z.number().nonnegative().default(15),
    })
    .default({}),
});

const OutputSchema = z.object({
  report_dir: z.string().default('reports'),
  log_dir: z.string().default('deletion-logs'),
});

/**
 * Configuration schema validation using Zod.
 *
 * Every section is optional; missing values take the documented defaults.
 */
export const ConfigSchema = z
  .object({
    version: z.string().default('1.0'),
    regions: z.array(z.string()).default([]),
    resource_kinds: z.array(z.enum(KIND_VALUES)).default([]),
    thresholds: ThresholdsSchema.default({}),
    metric_windows: MetricWindowsSchema.default({}),
    cleanup: CleanupSchema.default({}),
    output: OutputSchema.default({}),
  })
  .passthrough();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the SSM parameter is not found.
 */
export class ParameterNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParameterNotFoundError';
  }
}

/**
 * Raised when a local configuration file does not exist.
 */
export class ConfigFileNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigFileNotFoundError';
  }
}

/**
 * Raised when the configuration has invalid fields.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * LRU cache for configuration objects, keyed by source ("ssm:<name>" / "file:<path>").
 */
const configCache = new LRUCache<string, Config>({
  max: 128,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Parse and validate a YAML document.
 *
 * An empty document yields the all-defaults configuration.
 *
 * @param source - Where the text came from, used in error messages
 * @throws {ConfigError} If the YAML cannot be parsed
 * @throws {ConfigValidationError} If fields are invalid
 */
export function parseConfig(text: string, source: string): Config {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML configuration from ${source}: ${String(error)}`, {
      cause: error,
    });
  }

  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const fields = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigValidationError(
      `Configuration validation failed. Invalid fields: ${fields.join('; ')}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Loads configuration from a local YAML file.
 *
 * @throws {ConfigFileNotFoundError} If the file does not exist
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If fields are invalid
 */
export async function loadConfigFromFile(path: string): Promise<Config> {
  const key = `file:${path}`;
  const cached = configCache.get(key);
  if (cached) {
    logger.debug({ path }, 'Using cached config');
    return cached;
  }

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigFileNotFoundError(`Configuration file not found: ${path}`, { cause: error });
    }
    throw new ConfigError(`Failed to read configuration file ${path}: ${String(error)}`, {
      cause: error,
    });
  }

  const config = parseConfig(text, path);
  configCache.set(key, config);

  logger.info({ path }, 'Config loaded from file');
  return config;
}

/**
 * Loads configuration from an AWS SSM parameter.
 *
 * @param parameterName - The name of the SSM parameter
 * @param client - Optional SSM client for testing
 *
 * @throws {ParameterNotFoundError} If the parameter is not found
 * @throws {ConfigError} If the configuration cannot be retrieved or parsed
 * @throws {ConfigValidationError} If fields are invalid
 */
export async function loadConfigFromSsm(parameterName: string, client?: SSMClient): Promise<Config> {
  const key = `ssm:${parameterName}`;
  const cached = configCache.get(key);
  if (cached) {
    logger.debug({ parameterName }, 'Using cached config');
    return cached;
  }

  logger.info({ parameterName }, 'Loading config from SSM');

  const ssmClient = client ?? new SSMClient({});

  let parameterValue: string;
  try {
    const response = await ssmClient.send(new GetParameterCommand({ Name: parameterName }));
    parameterValue = response.Parameter?.Value ?? '';
  } catch (error) {
    if (error && typeof error === 'object' && 'name' in error && error.name === 'ParameterNotFound') {
      throw new ParameterNotFoundError(`Could not find SSM parameter: ${parameterName}`, {
        cause: error,
      });
    }
    throw new ConfigError(`Failed to retrieve SSM parameter: ${String(error)}`, { cause: error });
  }

  if (!parameterValue) {
    throw new ConfigError(`SSM parameter ${parameterName} exists but has no value`);
  }

  const config = parseConfig(parameterValue, `parameter ${parameterName}`);
  configCache.set(key, config);

  logger.info({ parameterName }, 'Config loaded from SSM');
  return config;
}

/**
 * Clears the configuration cache.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}

/**
 * Convert the validated snake_case thresholds into the frozen runtime set.
 */
export function toThresholdConfig(config: Config): ThresholdConfig {
  const t = config.thresholds;
  const windows: Partial<Record<ResourceKind, number>> = {};
  for (const kind of RESOURCE_KINDS) {
    const value = config.metric_windows[kind];
    if (value !== undefined) {
      windows[kind] = value;
    }
  }

  return createThresholds({
    stoppedInstanceMinDays: t.stopped_instance_min_days,
    unattachedVolumeMinDays: t.unattached_volume_min_days,
    snapshotReviewMinDays: t.snapshot_review_min_days,
    snapshotDeleteMinDays: t.snapshot_delete_min_days,
    cpuIdlePercent: t.cpu_idle_percent,
    idleActivityMinDays: t.idle_activity_min_days,
    idleFunctionMinDays: t.idle_function_min_days,
    emptyBucketMinDays: t.empty_bucket_min_days,
    idleActivityThreshold: t.idle_activity_threshold,
    natIdleBytesThreshold: t.nat_idle_bytes_threshold,
    nearlyEmptyBucketGb: t.nearly_empty_bucket_gb,
    metricWindows: windows,
  });
}

/**
 * Build executor options from the cleanup section. Command-line flags are
 * applied on top by the caller.
 */
export function toExecutorOptions(config: Config, mode: RunMode): ExecutorOptions {
  return {
    mode,
    backupBeforeDelete: config.cleanup.backup_before_delete,
    protectTagPatterns: [...config.cleanup.protect_tags],
    minAgeDaysOverride: config.cleanup.min_age_days,
    maxResourcesThisRun: config.cleanup.max_resources,
  };
}

/**
 * Kinds selected by the configuration; empty means all.
 */
export function selectedKinds(config: Config): ResourceKind[] {
  return config.resource_kinds.length > 0 ? [...config.resource_kinds] : [...RESOURCE_KINDS];
}
