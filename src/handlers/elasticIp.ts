import {
  EC2Client,
  DescribeAddressesCommand,
  ReleaseAddressCommand,
} from '@aws-sdk/client-ec2';
import { isNotFoundError } from '@shared/errors';
import type { FloatingIpRecord } from '@shared/types';
import { BaseDeletionHandler } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['InvalidAllocationID.NotFound', 'InvalidAddress.NotFound'];

/**
 * Floating IP (Elastic IP) handler. Records are keyed by allocation id.
 */
export class ElasticIpHandler extends BaseDeletionHandler<FloatingIpRecord> {
  private ec2Client: EC2Client;

  constructor(record: FloatingIpRecord, context: HandlerContext) {
    super(record, context);
    this.ec2Client = new EC2Client({ region: record.region });
  }

  /**
   * @returns "associated" / "unassociated", or undefined once released
   */
  async readState(): Promise<string | undefined> {
    try {
      const response = await this.ec2Client.send(
        new DescribeAddressesCommand({ AllocationIds: [this.record.id] })
      );
      const address = response.Addresses?.[0];
      if (!address) {
        return undefined;
      }
      return address.AssociationId || address.InstanceId || address.NetworkInterfaceId
        ? 'associated'
        : 'unassociated';
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.ec2Client.send(
      new DescribeAddressesCommand({ AllocationIds: [this.record.id] })
    );
    return { address: response.Addresses?.[0] ?? null };
  }

  async destroy(): Promise<void> {
    await this.ec2Client.send(new ReleaseAddressCommand({ AllocationId: this.record.id }));
    this.logger.info(
      { allocationId: this.record.id, publicIp: this.record.publicIp },
      'Address released'
    );
  }
}
