/**
 * Volume handler: snapshot backup, delete.
 */

import {
  EC2Client,
  CreateSnapshotCommand,
  DeleteVolumeCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
} from '@aws-sdk/client-ec2';
import { BackupError, isNotFoundError } from '@shared/errors';
import type { BackupResult, VolumeRecord } from '@shared/types';
import { BaseDeletionHandler, waitForBackup } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['InvalidVolume.NotFound', 'InvalidVolumeID.Malformed'];

export class EbsVolumeHandler extends BaseDeletionHandler<VolumeRecord> {
  private ec2Client: EC2Client;

  constructor(record: VolumeRecord, context: HandlerContext) {
    super(record, context);
    this.ec2Client = new EC2Client({ region: record.region });
  }

  async readState(): Promise<string | undefined> {
    try {
      const response = await this.ec2Client.send(
        new DescribeVolumesCommand({ VolumeIds: [this.record.id] })
      );
      return response.Volumes?.[0]?.State?.toLowerCase();
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.ec2Client.send(
      new DescribeVolumesCommand({ VolumeIds: [this.record.id] })
    );
    return { volume: response.Volumes?.[0] ?? null };
  }

  async backup(): Promise<BackupResult> {
    const response = await this.ec2Client.send(
      new CreateSnapshotCommand({
        VolumeId: this.record.id,
        Description: `Backup of ${this.record.id} before deletion (session ${this.context.sessionId})`,
        TagSpecifications: [{ ResourceType: 'snapshot', Tags: this.backupTags() }],
      })
    );

    const snapshotId = response.SnapshotId;
    if (!snapshotId) {
      throw new BackupError(`CreateSnapshot returned no snapshot id for ${this.record.id}`);
    }

    this.logger.info({ volumeId: this.record.id, snapshotId }, 'Waiting for snapshot');

    await waitForBackup(
      async () => {
        const snapshots = await this.ec2Client.send(
          new DescribeSnapshotsCommand({ SnapshotIds: [snapshotId] })
        );
        const state = snapshots.Snapshots?.[0]?.State;
        if (state === 'completed') return 'complete';
        if (state === 'error') return 'failed';
        return 'pending';
      },
      this.context.backupWait,
      `snapshot ${snapshotId}`,
      this.logger
    );

    return { ref: snapshotId, type: 'volume-snapshot' };
  }

  async destroy(): Promise<void> {
    await this.ec2Client.send(new DeleteVolumeCommand({ VolumeId: this.record.id }));
    this.logger.info({ volumeId: this.record.id }, 'Volume deleted');
  }
}
