/**
 * Instance handler: AMI backup, terminate.
 */

import {
  EC2Client,
  CreateImageCommand,
  DescribeImagesCommand,
  DescribeInstancesCommand,
  TerminateInstancesCommand,
} from '@aws-sdk/client-ec2';
import { BackupError, isNotFoundError } from '@shared/errors';
import type { BackupResult, InstanceRecord } from '@shared/types';
import { BaseDeletionHandler, waitForBackup } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['InvalidInstanceID.NotFound', 'InvalidInstanceID.Malformed'];
const FAILED_IMAGE_STATES = ['failed', 'error', 'invalid', 'deregistered'];

export class Ec2InstanceHandler extends BaseDeletionHandler<InstanceRecord> {
  private ec2Client: EC2Client;

  constructor(record: InstanceRecord, context: HandlerContext) {
    super(record, context);
    this.ec2Client = new EC2Client({ region: record.region });
  }

  async readState(): Promise<string | undefined> {
    try {
      const response = await this.ec2Client.send(
        new DescribeInstancesCommand({ InstanceIds: [this.record.id] })
      );
      const instance = response.Reservations?.[0]?.Instances?.[0];
      return instance?.State?.Name?.toLowerCase();
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.ec2Client.send(
      new DescribeInstancesCommand({ InstanceIds: [this.record.id] })
    );
    return { instance: response.Reservations?.[0]?.Instances?.[0] ?? null };
  }

  /**
   * Create an AMI without rebooting and wait for it to become available.
   */
  async backup(): Promise<BackupResult> {
    const response = await this.ec2Client.send(
      new CreateImageCommand({
        InstanceId: this.record.id,
        Name: this.backupName(),
        Description: `Backup of ${this.record.id} before deletion`,
        NoReboot: true,
        TagSpecifications: [{ ResourceType: 'image', Tags: this.backupTags() }],
      })
    );

    const imageId = response.ImageId;
    if (!imageId) {
      throw new BackupError(`CreateImage returned no image id for ${this.record.id}`);
    }

    this.logger.info({ instanceId: this.record.id, imageId }, 'Waiting for AMI');

    await waitForBackup(
      async () => {
        const images = await this.ec2Client.send(new DescribeImagesCommand({ ImageIds: [imageId] }));
        const state = images.Images?.[0]?.State?.toLowerCase();
        if (state === 'available') return 'complete';
        if (state && FAILED_IMAGE_STATES.includes(state)) return 'failed';
        return 'pending';
      },
      this.context.backupWait,
      `AMI ${imageId}`,
      this.logger
    );

    return { ref: imageId, type: 'machine-image' };
  }

  async destroy(): Promise<void> {
    await this.ec2Client.send(new TerminateInstancesCommand({ InstanceIds: [this.record.id] }));
    this.logger.info({ instanceId: this.record.id }, 'Terminate requested');
  }
}
