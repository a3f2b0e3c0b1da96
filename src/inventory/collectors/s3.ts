/**
 * Object bucket collector. Buckets are global: listed once, then placed in
 * their home region.
 */

import {
  S3Client,
  GetBucketEncryptionCommand,
  GetBucketLocationCommand,
  GetBucketTaggingCommand,
  GetBucketVersioningCommand,
  GetPublicAccessBlockCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  type Bucket,
  type PublicAccessBlockConfiguration,
} from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { isNotFoundError } from '@shared/errors';
import type { MetricWindows, ObjectBucketRecord, PublicAccessStatus } from '@shared/types';
import { parseTimestamp } from '@shared/utils/age';
import type { MetricsClient } from '@/inventory/metrics';
import { tagsFromList } from '@/inventory/types';

const BYTES_PER_GB = 1024 ** 3;

export interface BucketCollectorOptions {
  /**
   * Keep only buckets in these regions; all when undefined.
   */
  regions?: readonly string[];
  windows: MetricWindows;
  metricsFor: (region: string) => MetricsClient;
  logger: Logger;
}

/**
 * GetBucketLocation returns an empty constraint for us-east-1 and "EU" for
 * old eu-west-1 buckets.
 */
export function normalizeBucketRegion(constraint: string | undefined | null): string {
  if (!constraint) return 'us-east-1';
  if (constraint === 'EU') return 'eu-west-1';
  return constraint;
}

async function bucketTags(client: S3Client, bucket: string): Promise<Record<string, string>> {
  try {
    const response = await client.send(new GetBucketTaggingCommand({ Bucket: bucket }));
    return tagsFromList(response.TagSet);
  } catch (error) {
    if (isNotFoundError(error, ['NoSuchTagSet'])) {
      return {};
    }
    throw error;
  }
}

async function bucketVersioning(client: S3Client, bucket: string): Promise<string> {
  const response = await client.send(new GetBucketVersioningCommand({ Bucket: bucket }));
  return response.Status ?? 'Disabled';
}

async function bucketEncryption(client: S3Client, bucket: string): Promise<string> {
  try {
    const response = await client.send(new GetBucketEncryptionCommand({ Bucket: bucket }));
    const rule = response.ServerSideEncryptionConfiguration?.Rules?.[0];
    return rule?.ApplyServerSideEncryptionByDefault?.SSEAlgorithm ?? 'None';
  } catch (error) {
    if (isNotFoundError(error, ['ServerSideEncryptionConfigurationNotFoundError'])) {
      return 'None';
    }
    throw error;
  }
}

export function publicAccessStatus(
  configuration: PublicAccessBlockConfiguration | undefined
): PublicAccessStatus {
  const flags = [
    configuration?.BlockPublicAcls,
    configuration?.IgnorePublicAcls,
    configuration?.BlockPublicPolicy,
    configuration?.RestrictPublicBuckets,
  ];
  const set = flags.filter((flag) => flag === true).length;
  if (set === flags.length) return 'Blocked';
  return set === 0 ? 'None' : 'Partial';
}

async function bucketPublicAccess(client: S3Client, bucket: string): Promise<PublicAccessStatus> {
  try {
    const response = await client.send(new GetPublicAccessBlockCommand({ Bucket: bucket }));
    return publicAccessStatus(response.PublicAccessBlockConfiguration);
  } catch (error) {
    if (isNotFoundError(error, ['NoSuchPublicAccessBlockConfiguration'])) {
      return 'None';
    }
    throw error;
  }
}

export async function collectBuckets(options: BucketCollectorOptions): Promise<ObjectBucketRecord[]> {
  const globalClient = new S3Client({ region: 'us-east-1' });
  const regionalClients = new Map<string, S3Client>();
  const clientFor = (region: string): S3Client => {
    let client = regionalClients.get(region);
    if (!client) {
      client = new S3Client({ region });
      regionalClients.set(region, client);
    }
    return client;
  };

  const buckets: Bucket[] = [];
  let continuationToken: string | undefined;
  do {
    const response = await globalClient.send(
      new ListBucketsCommand({ ContinuationToken: continuationToken })
    );
    buckets.push(...(response.Buckets ?? []));
    continuationToken = response.ContinuationToken;
  } while (continuationToken);

  const records: ObjectBucketRecord[] = [];

  for (const bucket of buckets) {
    const name = bucket.Name;
    if (!name) continue;

    let region: string;
    try {
      const location = await globalClient.send(new GetBucketLocationCommand({ Bucket: name }));
      region = normalizeBucketRegion(location.LocationConstraint);
    } catch (error) {
      options.logger.warn({ bucket: name, error }, 'Could not resolve bucket region, skipping');
      continue;
    }
    if (options.regions && !options.regions.includes(region)) continue;

    const client = clientFor(region);
    const record: ObjectBucketRecord = {
      kind: 'ObjectBucket',
      region,
      id: name,
      label: name,
      state: 'unknown',
      createdAt: parseTimestamp(bucket.CreationDate),
      tags: {},
    };

    try {
      record.tags = await bucketTags(client, name);
    } catch (error) {
      options.logger.warn({ bucket: name, error }, 'Could not read bucket tags');
    }

    const setting = async <T>(
      read: (client: S3Client, bucket: string) => Promise<T>,
      unknown: T,
      what: string
    ): Promise<T> => {
      try {
        return await read(client, name);
      } catch (error) {
        options.logger.warn({ bucket: name, error }, `Could not read bucket ${what}`);
        return unknown;
      }
    };
    record.versioning = await setting(bucketVersioning, 'Unknown', 'versioning');
    record.encryption = await setting(bucketEncryption, 'Unknown', 'encryption');
    record.publicAccess = await setting(bucketPublicAccess, 'Unknown', 'public access block');

    try {
      const listing = await client.send(new ListObjectsV2Command({ Bucket: name, MaxKeys: 1 }));
      if ((listing.KeyCount ?? 0) === 0) {
        record.state = 'empty';
        record.objectCount = 0;
        record.sizeGb = 0;
      } else {
        record.state = 'not-empty';
        const metrics = options.metricsFor(region);
        const windowDays = options.windows.ObjectBucket;
        const [objects, bytes] = await Promise.all([
          metrics.trailingAverage({
            namespace: 'AWS/S3',
            metricName: 'NumberOfObjects',
            dimensions: [
              { Name: 'BucketName', Value: name },
              { Name: 'StorageType', Value: 'AllStorageTypes' },
            ],
            statistic: 'Average',
            windowDays,
          }),
          metrics.trailingAverage({
            namespace: 'AWS/S3',
            metricName: 'BucketSizeBytes',
            dimensions: [
              { Name: 'BucketName', Value: name },
              { Name: 'StorageType', Value: 'StandardStorage' },
            ],
            statistic: 'Average',
            windowDays,
          }),
        ]);
        // The listing saw a key, so at least one object.
        record.objectCount = objects === undefined ? undefined : Math.max(1, Math.round(objects));
        record.sizeGb = bytes === undefined ? undefined : Math.round((bytes / BYTES_PER_GB) * 1000) / 1000;
      }
    } catch (error) {
      options.logger.warn({ bucket: name, error }, 'Could not list bucket contents');
    }

    records.push(record);
  }

  return records;
}
