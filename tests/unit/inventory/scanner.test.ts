import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  EC2Client,
  DescribeAddressesCommand,
  DescribeRegionsCommand,
  DescribeVolumesCommand,
} from '@aws-sdk/client-ec2';
import { S3Client, ListBucketsCommand } from '@aws-sdk/client-s3';
import { Scanner } from '@/inventory/scanner';
import { MetricsClient } from '@/inventory/metrics';
import { NOW } from '../../helpers/fixtures';

const ec2Mock = mockClient(EC2Client);
const s3Mock = mockClient(S3Client);

const metricsFactory = (region: string): MetricsClient => new MetricsClient(region, () => NOW);

describe('Scanner', () => {
  beforeEach(() => {
    ec2Mock.reset();
    s3Mock.reset();
  });

  it('scans the configured regions in order without listing regions', async () => {
    ec2Mock.on(DescribeVolumesCommand).resolves({ Volumes: [{ VolumeId: 'vol-1', State: 'available' }] });
    ec2Mock.on(DescribeAddressesCommand).resolves({ Addresses: [{ AllocationId: 'eipalloc-1' }] });
    const scanner = new Scanner(
      { regions: ['us-east-1', 'eu-west-1'], kinds: ['Volume', 'FloatingIP'] },
      metricsFactory
    );

    const result = await scanner.scan();

    expect(result.regions).toEqual(['us-east-1', 'eu-west-1']);
    expect(result.records.map((record) => `${record.region}/${record.kind}/${record.id}`)).toEqual([
      'us-east-1/Volume/vol-1',
      'us-east-1/FloatingIP/eipalloc-1',
      'eu-west-1/Volume/vol-1',
      'eu-west-1/FloatingIP/eipalloc-1',
    ]);
    expect(result.failures).toEqual([]);
    expect(ec2Mock.commandCalls(DescribeRegionsCommand)).toHaveLength(0);
  });

  it('records a failed slice and keeps scanning', async () => {
    ec2Mock.on(DescribeVolumesCommand).resolves({ Volumes: [{ VolumeId: 'vol-1', State: 'available' }] });
    ec2Mock.on(DescribeAddressesCommand).rejects(new Error('UnauthorizedOperation'));
    const scanner = new Scanner({ regions: ['us-east-1'], kinds: ['FloatingIP', 'Volume'] }, metricsFactory);

    const result = await scanner.scan();

    expect(result.records.map((record) => record.id)).toEqual(['vol-1']);
    expect(result.failures).toEqual([
      { region: 'us-east-1', kind: 'FloatingIP', message: 'UnauthorizedOperation' },
    ]);
  });

  it('lists enabled regions when none are configured', async () => {
    ec2Mock.on(DescribeRegionsCommand).resolves({
      Regions: [{ RegionName: 'us-west-2' }, { RegionName: 'eu-west-1' }, {}],
    });

    const scanner = new Scanner({ kinds: ['Volume'], homeRegion: 'us-east-1' }, metricsFactory);

    await expect(scanner.resolveRegions()).resolves.toEqual(['eu-west-1', 'us-west-2']);
    expect(ec2Mock.commandCalls(DescribeRegionsCommand)[0].args[0].input).toEqual({ AllRegions: false });
  });

  it('reports a failed bucket listing as a global failure', async () => {
    s3Mock.on(ListBucketsCommand).rejects(new Error('AccessDenied'));
    const scanner = new Scanner({ regions: ['us-east-1'], kinds: ['ObjectBucket'] }, metricsFactory);

    const result = await scanner.scan();

    expect(result.records).toEqual([]);
    expect(result.failures).toEqual([{ region: 'global', kind: 'ObjectBucket', message: 'AccessDenied' }]);
  });
});
