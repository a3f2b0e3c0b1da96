import {
  EC2Client,
  DeleteNatGatewayCommand,
  DescribeNatGatewaysCommand,
} from '@aws-sdk/client-ec2';
import { isNotFoundError } from '@shared/errors';
import type { NatGatewayRecord } from '@shared/types';
import { BaseDeletionHandler } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['NatGatewayNotFound', 'InvalidNatGatewayID.NotFound'];

export class NatGatewayHandler extends BaseDeletionHandler<NatGatewayRecord> {
  private ec2Client: EC2Client;

  constructor(record: NatGatewayRecord, context: HandlerContext) {
    super(record, context);
    this.ec2Client = new EC2Client({ region: record.region });
  }

  async readState(): Promise<string | undefined> {
    try {
      const response = await this.ec2Client.send(
        new DescribeNatGatewaysCommand({ NatGatewayIds: [this.record.id] })
      );
      return response.NatGateways?.[0]?.State?.toLowerCase();
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.ec2Client.send(
      new DescribeNatGatewaysCommand({ NatGatewayIds: [this.record.id] })
    );
    return { natGateway: response.NatGateways?.[0] ?? null };
  }

  /**
   * Deletion is asynchronous on the provider side; the gateway moves to
   * "deleting" and its Elastic IP stays allocated.
   */
  async destroy(): Promise<void> {
    await this.ec2Client.send(new DeleteNatGatewayCommand({ NatGatewayId: this.record.id }));
    this.logger.info({ natGatewayId: this.record.id }, 'NAT gateway deletion requested');
  }
}
