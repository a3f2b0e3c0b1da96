import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { mockClient } from 'aws-sdk-client-mock';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import {
  clearConfigCache,
  ConfigError,
  ConfigFileNotFoundError,
  ConfigValidationError,
  loadConfigFromFile,
  loadConfigFromSsm,
  ParameterNotFoundError,
  parseConfig,
  selectedKinds,
  toExecutorOptions,
  toThresholdConfig,
} from '@/core/config';
import { createThresholds, DEFAULT_THRESHOLDS, minimumAgeForKind } from '@/core/thresholds';

const ssmMock = mockClient(SSMClient);

const sampleConfig = `
version: "1.0"
regions:
  - us-east-1
  - eu-west-1
resource_kinds:
  - Volume
  - Snapshot
thresholds:
  unattached_volume_min_days: 30
  cpu_idle_percent: 10
metric_windows:
  Instance: 14
cleanup:
  protect_tags:
    - DoNotDelete=true
    - Retention
  backup_before_delete: true
  max_resources: 25
`;

describe('Config Loader', () => {
  beforeEach(() => {
    ssmMock.reset();
    clearConfigCache();
  });

  describe('parseConfig', () => {
    it('fills defaults for an empty document', () => {
      const config = parseConfig('', 'test');

      expect(config.regions).toEqual([]);
      expect(config.cleanup).toEqual({
        protect_tags: ['DoNotDelete=true'],
        backup_before_delete: false,
        backup_wait: { max_attempts: 40, delay_seconds: 15 },
      });
      expect(config.output).toEqual({ report_dir: 'reports', log_dir: 'deletion-logs' });
      expect(toThresholdConfig(config)).toEqual(DEFAULT_THRESHOLDS);
    });

    it('maps thresholds and metric windows', () => {
      const thresholds = toThresholdConfig(parseConfig(sampleConfig, 'test'));

      expect(thresholds.unattachedVolumeMinDays).toBe(30);
      expect(thresholds.cpuIdlePercent).toBe(10);
      expect(thresholds.stoppedInstanceMinDays).toBe(90);
      expect(thresholds.metricWindows.Instance).toBe(14);
      expect(thresholds.metricWindows.LoadBalancer).toBe(30);
      expect(Object.isFrozen(thresholds)).toBe(true);
    });

    it('builds executor options and kind selection', () => {
      const config = parseConfig(sampleConfig, 'test');

      expect(toExecutorOptions(config, 'dry-run')).toEqual({
        mode: 'dry-run',
        backupBeforeDelete: true,
        protectTagPatterns: ['DoNotDelete=true', 'Retention'],
        minAgeDaysOverride: undefined,
        maxResourcesThisRun: 25,
      });
      expect(selectedKinds(config)).toEqual(['Volume', 'Snapshot']);
      expect(selectedKinds(parseConfig('', 'test'))).toHaveLength(9);
    });

    it('lists every invalid field', () => {
      const invalid = `
resource_kinds: [Volume, Widget]
thresholds:
  cpu_idle_percent: 150
`;
      expect(() => parseConfig(invalid, 'test')).toThrow(ConfigValidationError);
      expect(() => parseConfig(invalid, 'test')).toThrow(/resource_kinds\.1: .*; thresholds\.cpu_idle_percent: /);
    });

    it('rejects a delete threshold below the review threshold', () => {
      const invalid = `
thresholds:
  snapshot_review_min_days: 200
  snapshot_delete_min_days: 100
`;
      expect(() => parseConfig(invalid, 'test')).toThrow(
        'Configuration validation failed. Invalid fields: thresholds.snapshot_delete_min_days: snapshot_delete_min_days must not be less than snapshot_review_min_days'
      );
    });

    it('rejects malformed YAML', () => {
      expect(() => parseConfig('regions: [unclosed', 'test')).toThrow(ConfigError);
      expect(() => parseConfig('regions: [unclosed', 'test')).toThrow(
        /^Failed to parse YAML configuration from test/
      );
    });
  });

  describe('loadConfigFromSsm', () => {
    it('loads and caches the parameter', async () => {
      ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: sampleConfig } });

      const first = await loadConfigFromSsm('/test/parameter');
      const second = await loadConfigFromSsm('/test/parameter');

      expect(first.regions).toEqual(['us-east-1', 'eu-west-1']);
      expect(second).toBe(first);
      expect(ssmMock.calls()).toHaveLength(1);
      expect(ssmMock.call(0).args[0].input).toEqual({ Name: '/test/parameter' });
    });

    it('raises ParameterNotFoundError for a missing parameter', async () => {
      const notFound = new Error('Parameter not found');
      notFound.name = 'ParameterNotFound';
      ssmMock.on(GetParameterCommand).rejects(notFound);

      await expect(loadConfigFromSsm('/missing')).rejects.toThrow(ParameterNotFoundError);
    });

    it('raises ConfigError for other SSM failures and for empty values', async () => {
      ssmMock.on(GetParameterCommand).rejects(new Error('AccessDenied'));
      await expect(loadConfigFromSsm('/denied')).rejects.toThrow(
        'Failed to retrieve SSM parameter: Error: AccessDenied'
      );

      ssmMock.reset();
      ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: '' } });
      await expect(loadConfigFromSsm('/empty')).rejects.toThrow(
        'SSM parameter /empty exists but has no value'
      );
    });
  });

  describe('loadConfigFromFile', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(tmpdir(), 'cloud-sweep-config-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('loads a YAML file', async () => {
      const file = path.join(directory, 'config.yml');
      await writeFile(file, sampleConfig, 'utf8');

      const config = await loadConfigFromFile(file);
      expect(config.cleanup.max_resources).toBe(25);
    });

    it('raises ConfigFileNotFoundError for a missing file', async () => {
      const file = path.join(directory, 'absent.yml');
      await expect(loadConfigFromFile(file)).rejects.toThrow(ConfigFileNotFoundError);
      await expect(loadConfigFromFile(file)).rejects.toThrow(`Configuration file not found: ${file}`);
    });
  });
});

describe('thresholds', () => {
  it('overrides single values and windows', () => {
    const thresholds = createThresholds({ snapshotDeleteMinDays: 500, metricWindows: { NATGateway: 7 } });

    expect(thresholds.snapshotDeleteMinDays).toBe(500);
    expect(thresholds.snapshotReviewMinDays).toBe(90);
    expect(thresholds.metricWindows.NATGateway).toBe(7);
    expect(thresholds.metricWindows.Instance).toBe(30);
  });

  it('gives the executor a minimum age per kind', () => {
    expect(minimumAgeForKind('Instance', DEFAULT_THRESHOLDS)).toBe(90);
    expect(minimumAgeForKind('Snapshot', DEFAULT_THRESHOLDS)).toBe(365);
    expect(minimumAgeForKind('ObjectBucket', DEFAULT_THRESHOLDS)).toBe(180);
    expect(minimumAgeForKind('FloatingIP', DEFAULT_THRESHOLDS)).toBe(0);
    expect(minimumAgeForKind('ManagedDB', DEFAULT_THRESHOLDS)).toBe(0);
  });
});
