/**
 * Unit tests for handlers/factory.ts
 */

import { describe, it, expect } from 'vitest';
import { getHandler } from '@/handlers/factory';
import type { HandlerContext } from '@/handlers/base';
import { EbsSnapshotHandler } from '@/handlers/ebsSnapshot';
import { EbsVolumeHandler } from '@/handlers/ebsVolume';
import { Ec2InstanceHandler } from '@/handlers/ec2Instance';
import { ElasticIpHandler } from '@/handlers/elasticIp';
import { LambdaFunctionHandler } from '@/handlers/lambdaFunction';
import { ClassicElbHandler, ElbV2Handler } from '@/handlers/loadBalancer';
import { NatGatewayHandler } from '@/handlers/natGateway';
import { RdsInstanceHandler } from '@/handlers/rdsInstance';
import { S3BucketHandler } from '@/handlers/s3Bucket';
import {
  floatingIp,
  instance,
  loadBalancer,
  managedDb,
  natGateway,
  objectBucket,
  serverlessFunction,
  snapshot,
  volume,
} from '../../helpers/fixtures';

const context: HandlerContext = {
  sessionId: '20260301-000000',
  backupWait: { maxAttempts: 1, delaySeconds: 0 },
};

describe('Handler Factory', () => {
  it.each([
    ['Instance', instance(), Ec2InstanceHandler],
    ['Volume', volume(), EbsVolumeHandler],
    ['Snapshot', snapshot(), EbsSnapshotHandler],
    ['FloatingIP', floatingIp(), ElasticIpHandler],
    ['LoadBalancer', loadBalancer(), ElbV2Handler],
    ['ManagedDB', managedDb(), RdsInstanceHandler],
    ['ServerlessFunction', serverlessFunction(), LambdaFunctionHandler],
    ['NATGateway', natGateway(), NatGatewayHandler],
    ['ObjectBucket', objectBucket(), S3BucketHandler],
  ] as const)('returns the %s handler', (_kind, record, handlerClass) => {
    expect(getHandler(record, context)).toBeInstanceOf(handlerClass);
  });

  it('uses the classic handler for classic load balancers', () => {
    const record = loadBalancer({ id: 'legacy-web', lbType: 'classic', arn: undefined });

    expect(getHandler(record, context)).toBeInstanceOf(ClassicElbHandler);
  });
});
