/**
 * Multi-region inventory scan.
 *
 * Regions are scanned in parallel; kinds within a region run one after
 * another. Results keep region order, then kind order, with buckets last.
 * A failing (region, kind) slice is logged and skipped.
 */

import { EC2Client, DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import type { Logger } from 'pino';
import { DEFAULT_METRIC_WINDOWS } from '@/core/thresholds';
import { errorMessage } from '@shared/errors';
import { RESOURCE_KINDS } from '@shared/types';
import type { MetricWindows, ResourceKind, ResourceRecord } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { collectBuckets, REGIONAL_COLLECTORS } from './collectors';
import { MetricsClient } from './metrics';

export interface ScannerOptions {
  /**
   * Regions to scan; all enabled regions when empty or undefined.
   */
  regions?: readonly string[];
  kinds?: readonly ResourceKind[];
  windows?: MetricWindows;

  /**
   * Region used for account-level calls such as DescribeRegions.
   */
  homeRegion?: string;
}

export interface ScanFailure {
  region: string;
  kind: ResourceKind;
  message: string;
}

export interface ScanResult {
  regions: string[];
  records: ResourceRecord[];
  failures: ScanFailure[];
}

export type MetricsFactory = (region: string) => MetricsClient;

export class Scanner {
  private logger: Logger;
  private kinds: readonly ResourceKind[];
  private windows: MetricWindows;
  private metricsClients = new Map<string, MetricsClient>();

  constructor(
    private options: ScannerOptions = {},
    private metricsFactory: MetricsFactory = (region) => new MetricsClient(region)
  ) {
    this.logger = setupLogger('cloud-sweep:scanner');
    this.kinds = options.kinds && options.kinds.length > 0 ? options.kinds : RESOURCE_KINDS;
    this.windows = options.windows ?? DEFAULT_METRIC_WINDOWS;
  }

  private metricsFor(region: string): MetricsClient {
    let client = this.metricsClients.get(region);
    if (!client) {
      client = this.metricsFactory(region);
      this.metricsClients.set(region, client);
    }
    return client;
  }

  /**
   * Configured regions, or every region enabled for the account.
   */
  async resolveRegions(): Promise<string[]> {
    if (this.options.regions && this.options.regions.length > 0) {
      return [...this.options.regions];
    }

    const ec2Client = new EC2Client({
      region: this.options.homeRegion ?? process.env.AWS_REGION ?? 'us-east-1',
    });
    const response = await ec2Client.send(new DescribeRegionsCommand({ AllRegions: false }));
    const regions = (response.Regions ?? [])
      .flatMap((region) => (region.RegionName ? [region.RegionName] : []))
      .sort();

    this.logger.info({ count: regions.length }, 'Resolved enabled regions');
    return regions;
  }

  async scan(): Promise<ScanResult> {
    const regions = await this.resolveRegions();
    const failures: ScanFailure[] = [];

    this.logger.info({ regions, kinds: this.kinds }, 'Scan started');

    const perRegion = await Promise.all(
      regions.map((region) => this.scanRegion(region, failures))
    );
    const records = perRegion.flat();

    if (this.kinds.includes('ObjectBucket')) {
      try {
        const buckets = await collectBuckets({
          regions: this.options.regions && this.options.regions.length > 0 ? regions : undefined,
          windows: this.windows,
          metricsFor: (region) => this.metricsFor(region),
          logger: this.logger,
        });
        records.push(...buckets);
      } catch (error) {
        this.logger.warn({ kind: 'ObjectBucket', error }, 'Bucket listing failed, skipping');
        failures.push({ region: 'global', kind: 'ObjectBucket', message: errorMessage(error) });
      }
    }

    this.logger.info(
      { records: records.length, failures: failures.length },
      'Scan finished'
    );
    return { regions, records, failures };
  }

  private async scanRegion(region: string, failures: ScanFailure[]): Promise<ResourceRecord[]> {
    const records: ResourceRecord[] = [];

    for (const kind of this.kinds) {
      if (kind === 'ObjectBucket') continue;

      try {
        const collected = await REGIONAL_COLLECTORS[kind]({
          region,
          metrics: this.metricsFor(region),
          windows: this.windows,
        });
        records.push(...collected);
        this.logger.debug({ region, kind, count: collected.length }, 'Collected');
      } catch (error) {
        this.logger.warn({ region, kind, error }, 'Collection failed, skipping');
        failures.push({ region, kind, message: errorMessage(error) });
      }
    }

    return records;
  }
}
