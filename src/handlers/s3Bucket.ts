import {
  S3Client,
  DeleteBucketCommand,
  GetBucketTaggingCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { isNotFoundError } from '@shared/errors';
import type { ObjectBucketRecord } from '@shared/types';
import { BaseDeletionHandler } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['NotFound', 'NoSuchBucket'];

/**
 * Object bucket handler. Only empty buckets are deletable; the provider
 * rejects deleting a bucket that still holds objects.
 */
export class S3BucketHandler extends BaseDeletionHandler<ObjectBucketRecord> {
  private s3Client: S3Client;

  constructor(record: ObjectBucketRecord, context: HandlerContext) {
    super(record, context);
    this.s3Client = new S3Client({ region: record.region });
  }

  /**
   * @returns "empty" / "not-empty", or undefined when the bucket is gone
   */
  async readState(): Promise<string | undefined> {
    try {
      await this.s3Client.send(new HeadBucketCommand({ Bucket: this.record.id }));
      const listing = await this.s3Client.send(
        new ListObjectsV2Command({ Bucket: this.record.id, MaxKeys: 1 })
      );
      return (listing.KeyCount ?? 0) === 0 ? 'empty' : 'not-empty';
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    try {
      const tagging = await this.s3Client.send(new GetBucketTaggingCommand({ Bucket: this.record.id }));
      return { bucket: this.record.id, region: this.record.region, tagSet: tagging.TagSet ?? [] };
    } catch (error) {
      if (isNotFoundError(error, ['NoSuchTagSet'])) {
        return { bucket: this.record.id, region: this.record.region, tagSet: [] };
      }
      throw error;
    }
  }

  async destroy(): Promise<void> {
    await this.s3Client.send(new DeleteBucketCommand({ Bucket: this.record.id }));
    this.logger.info({ bucket: this.record.id }, 'Bucket deleted');
  }
}
