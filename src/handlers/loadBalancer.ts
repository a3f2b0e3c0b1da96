/**
 * Load balancer handlers. Application, network and gateway load balancers go
 * through the ELBv2 API by ARN; classic load balancers by name.
 */

import {
  ElasticLoadBalancingV2Client,
  DeleteLoadBalancerCommand,
  DescribeListenersCommand,
  DescribeLoadBalancersCommand,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import {
  ElasticLoadBalancingClient,
  DeleteLoadBalancerCommand as DeleteClassicLoadBalancerCommand,
  DescribeLoadBalancersCommand as DescribeClassicLoadBalancersCommand,
} from '@aws-sdk/client-elastic-load-balancing';
import { isNotFoundError } from '@shared/errors';
import type { LoadBalancerRecord } from '@shared/types';
import { BaseDeletionHandler } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = [
  'LoadBalancerNotFoundException',
  'LoadBalancerNotFound',
  'AccessPointNotFoundException',
  'AccessPointNotFound',
];

export class ElbV2Handler extends BaseDeletionHandler<LoadBalancerRecord> {
  private elbClient: ElasticLoadBalancingV2Client;
  private loadBalancerArn: string;

  constructor(record: LoadBalancerRecord, context: HandlerContext) {
    super(record, context);
    this.elbClient = new ElasticLoadBalancingV2Client({ region: record.region });
    this.loadBalancerArn = record.arn ?? record.id;
  }

  async readState(): Promise<string | undefined> {
    try {
      const response = await this.elbClient.send(
        new DescribeLoadBalancersCommand({ LoadBalancerArns: [this.loadBalancerArn] })
      );
      const lb = response.LoadBalancers?.[0];
      if (!lb) {
        return undefined;
      }
      return lb.State?.Code?.toLowerCase() ?? 'unknown';
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const [lbs, listeners] = await Promise.all([
      this.elbClient.send(
        new DescribeLoadBalancersCommand({ LoadBalancerArns: [this.loadBalancerArn] })
      ),
      this.elbClient.send(new DescribeListenersCommand({ LoadBalancerArn: this.loadBalancerArn })),
    ]);
    return {
      loadBalancer: lbs.LoadBalancers?.[0] ?? null,
      listeners: listeners.Listeners ?? [],
    };
  }

  async destroy(): Promise<void> {
    await this.elbClient.send(new DeleteLoadBalancerCommand({ LoadBalancerArn: this.loadBalancerArn }));
    this.logger.info({ loadBalancerArn: this.loadBalancerArn }, 'Load balancer deleted');
  }
}

/**
 * Classic load balancers report no lifecycle state; an existing one is "active".
 */
export class ClassicElbHandler extends BaseDeletionHandler<LoadBalancerRecord> {
  private elbClient: ElasticLoadBalancingClient;

  constructor(record: LoadBalancerRecord, context: HandlerContext) {
    super(record, context);
    this.elbClient = new ElasticLoadBalancingClient({ region: record.region });
  }

  async readState(): Promise<string | undefined> {
    try {
      const response = await this.elbClient.send(
        new DescribeClassicLoadBalancersCommand({ LoadBalancerNames: [this.record.id] })
      );
      return response.LoadBalancerDescriptions?.length ? 'active' : undefined;
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    const response = await this.elbClient.send(
      new DescribeClassicLoadBalancersCommand({ LoadBalancerNames: [this.record.id] })
    );
    return { loadBalancer: response.LoadBalancerDescriptions?.[0] ?? null };
  }

  async destroy(): Promise<void> {
    await this.elbClient.send(
      new DeleteClassicLoadBalancerCommand({ LoadBalancerName: this.record.id })
    );
    this.logger.info({ loadBalancerName: this.record.id }, 'Classic load balancer deleted');
  }
}
