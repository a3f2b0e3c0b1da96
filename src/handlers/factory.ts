/**
 * Simple factory for creating kind-specific deletion handlers.
 */

import type { ResourceRecord } from '@shared/types';
import type { DeletionHandler, HandlerContext } from './base';
import { EbsSnapshotHandler } from './ebsSnapshot';
import { EbsVolumeHandler } from './ebsVolume';
import { Ec2InstanceHandler } from './ec2Instance';
import { ElasticIpHandler } from './elasticIp';
import { LambdaFunctionHandler } from './lambdaFunction';
import { ClassicElbHandler, ElbV2Handler } from './loadBalancer';
import { NatGatewayHandler } from './natGateway';
import { RdsInstanceHandler } from './rdsInstance';
import { S3BucketHandler } from './s3Bucket';

export type HandlerFactory = (record: ResourceRecord, context: HandlerContext) => DeletionHandler;

/**
 * Get the handler for a record's kind.
 */
export function getHandler(record: ResourceRecord, context: HandlerContext): DeletionHandler {
  switch (record.kind) {
    case 'Instance':
      return new Ec2InstanceHandler(record, context);
    case 'Volume':
      return new EbsVolumeHandler(record, context);
    case 'Snapshot':
      return new EbsSnapshotHandler(record, context);
    case 'FloatingIP':
      return new ElasticIpHandler(record, context);
    case 'LoadBalancer':
      return record.lbType === 'classic'
        ? new ClassicElbHandler(record, context)
        : new ElbV2Handler(record, context);
    case 'ManagedDB':
      return new RdsInstanceHandler(record, context);
    case 'ServerlessFunction':
      return new LambdaFunctionHandler(record, context);
    case 'NATGateway':
      return new NatGatewayHandler(record, context);
    case 'ObjectBucket':
      return new S3BucketHandler(record, context);
  }
}
