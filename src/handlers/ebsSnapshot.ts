import {
  EC2Client,
  DeleteSnapshotCommand,
  DescribeSnapshotsCommand,
} from '@aws-sdk/client-ec2';
import { isNotFoundError } from '@shared/errors';
import type { SnapshotRecord } from '@shared/types';
import { BaseDeletionHandler } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['InvalidSnapshot.NotFound', 'InvalidSnapshotID.Malformed'];

/**
 * Snapshot handler. A snapshot is itself a backup, so its own backup is a
 * configuration export.
 */
export class EbsSnapshotHandler extends BaseDeletionHandler<SnapshotRecord> {
  private ec2Client: EC2Client;

  constructor(record: SnapshotRecord, context: HandlerContext) {
    super(record, context);
    this.ec2Client = new EC2Client({ region: record.region });
  }

  async readState(): Promise<string | undefined> {
    try {
      const response = await this.ec2Client.send(
        new DescribeSnapshotsCommand({ SnapshotIds: [this.record.id] })
      );
      return response.Snapshots?.[0]?.State?.toLowerCase();
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.ec2Client.send(
      new DescribeSnapshotsCommand({ SnapshotIds: [this.record.id] })
    );
    return { snapshot: response.Snapshots?.[0] ?? null };
  }

  async destroy(): Promise<void> {
    await this.ec2Client.send(new DeleteSnapshotCommand({ SnapshotId: this.record.id }));
    this.logger.info({ snapshotId: this.record.id }, 'Snapshot deleted');
  }
}
