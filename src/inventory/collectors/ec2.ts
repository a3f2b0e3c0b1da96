/**
 * EC2-backed collectors: instances, volumes, snapshots, Elastic IPs, NAT gateways.
 */

import {
  EC2Client,
  DescribeAddressesCommand,
  DescribeInstancesCommand,
  DescribeNatGatewaysCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
} from '@aws-sdk/client-ec2';
import type {
  FloatingIpRecord,
  InstanceRecord,
  NatGatewayRecord,
  SnapshotRecord,
  VolumeRecord,
} from '@shared/types';
import { parseTimestamp } from '@shared/utils/age';
import { tagsFromList } from '@/inventory/types';
import type { CollectorContext } from '@/inventory/types';

export async function collectInstances(context: CollectorContext): Promise<InstanceRecord[]> {
  const ec2Client = new EC2Client({ region: context.region });
  const records: InstanceRecord[] = [];
  let nextToken: string | undefined;

  do {
    const response = await ec2Client.send(new DescribeInstancesCommand({ NextToken: nextToken }));
    for (const reservation of response.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        if (!instance.InstanceId) continue;

        const tags = tagsFromList(instance.Tags);
        const state = instance.State?.Name?.toLowerCase() ?? 'unknown';
        const utilization =
          state === 'running'
            ? await context.metrics.trailingAverage({
                namespace: 'AWS/EC2',
                metricName: 'CPUUtilization',
                dimensions: [{ Name: 'InstanceId', Value: instance.InstanceId }],
                statistic: 'Average',
                windowDays: context.windows.Instance,
              })
            : undefined;

        records.push({
          kind: 'Instance',
          region: context.region,
          id: instance.InstanceId,
          label: tags.Name ?? '',
          state,
          createdAt: parseTimestamp(instance.LaunchTime),
          utilization,
          tags,
          instanceType: instance.InstanceType,
          platform: instance.PlatformDetails ?? instance.Platform,
        });
      }
    }
    nextToken = response.NextToken;
  } while (nextToken);

  return records;
}

export async function collectVolumes(context: CollectorContext): Promise<VolumeRecord[]> {
  const ec2Client = new EC2Client({ region: context.region });
  const records: VolumeRecord[] = [];
  let nextToken: string | undefined;

  do {
    const response = await ec2Client.send(new DescribeVolumesCommand({ NextToken: nextToken }));
    for (const volume of response.Volumes ?? []) {
      const volumeId = volume.VolumeId;
      if (!volumeId) continue;

      const tags = tagsFromList(volume.Tags);
      const state = volume.State?.toLowerCase() ?? 'unknown';
      const [readOpsPerDay, writeOpsPerDay] =
        state === 'in-use'
          ? await Promise.all(
              ['VolumeReadOps', 'VolumeWriteOps'].map((metricName) =>
                context.metrics.trailingAverage({
                  namespace: 'AWS/EBS',
                  metricName,
                  dimensions: [{ Name: 'VolumeId', Value: volumeId }],
                  statistic: 'Sum',
                  windowDays: context.windows.Volume,
                })
              )
            )
          : [undefined, undefined];

      records.push({
        kind: 'Volume',
        region: context.region,
        id: volumeId,
        label: tags.Name ?? '',
        state,
        createdAt: parseTimestamp(volume.CreateTime),
        utilization:
          readOpsPerDay === undefined || writeOpsPerDay === undefined
            ? undefined
            : readOpsPerDay + writeOpsPerDay,
        tags,
        associatedId: volume.Attachments?.[0]?.InstanceId,
        sizeGb: volume.Size,
        volumeType: volume.VolumeType,
        iops: volume.Iops,
        encrypted: volume.Encrypted,
        readOpsPerDay,
        writeOpsPerDay,
      });
    }
    nextToken = response.NextToken;
  } while (nextToken);

  return records;
}

/**
 * Snapshots owned by this account only.
 */
export async function collectSnapshots(context: CollectorContext): Promise<SnapshotRecord[]> {
  const ec2Client = new EC2Client({ region: context.region });
  const records: SnapshotRecord[] = [];
  let nextToken: string | undefined;

  do {
    const response = await ec2Client.send(
      new DescribeSnapshotsCommand({ OwnerIds: ['self'], NextToken: nextToken })
    );
    for (const snapshot of response.Snapshots ?? []) {
      if (!snapshot.SnapshotId) continue;

      const tags = tagsFromList(snapshot.Tags);
      records.push({
        kind: 'Snapshot',
        region: context.region,
        id: snapshot.SnapshotId,
        label: tags.Name ?? '',
        state: snapshot.State?.toLowerCase() ?? 'unknown',
        createdAt: parseTimestamp(snapshot.StartTime),
        tags,
        associatedId: snapshot.VolumeId,
        sizeGb: snapshot.VolumeSize,
        description: snapshot.Description,
        encrypted: snapshot.Encrypted,
      });
    }
    nextToken = response.NextToken;
  } while (nextToken);

  return records;
}

/**
 * Elastic IPs, keyed by allocation id. The provider reports no allocation time.
 */
export async function collectAddresses(context: CollectorContext): Promise<FloatingIpRecord[]> {
  const ec2Client = new EC2Client({ region: context.region });
  const response = await ec2Client.send(new DescribeAddressesCommand({}));
  const records: FloatingIpRecord[] = [];

  for (const address of response.Addresses ?? []) {
    const id = address.AllocationId ?? address.PublicIp;
    if (!id) continue;

    const tags = tagsFromList(address.Tags);
    const associated = Boolean(address.InstanceId || address.NetworkInterfaceId);
    records.push({
      kind: 'FloatingIP',
      region: context.region,
      id,
      label: tags.Name ?? address.PublicIp ?? '',
      state: associated ? 'associated' : 'unassociated',
      tags,
      associatedId: address.InstanceId || undefined,
      publicIp: address.PublicIp,
      networkInterfaceId: address.NetworkInterfaceId || undefined,
    });
  }

  return records;
}

export async function collectNatGateways(context: CollectorContext): Promise<NatGatewayRecord[]> {
  const ec2Client = new EC2Client({ region: context.region });
  const records: NatGatewayRecord[] = [];
  let nextToken: string | undefined;

  do {
    const response = await ec2Client.send(new DescribeNatGatewaysCommand({ NextToken: nextToken }));
    for (const gateway of response.NatGateways ?? []) {
      if (!gateway.NatGatewayId) continue;

      const tags = tagsFromList(gateway.Tags);
      const state = gateway.State?.toLowerCase() ?? 'unknown';
      const utilization =
        state === 'available'
          ? await context.metrics.trailingAverage({
              namespace: 'AWS/NATGateway',
              metricName: 'BytesOutToDestination',
              dimensions: [{ Name: 'NatGatewayId', Value: gateway.NatGatewayId }],
              statistic: 'Sum',
              windowDays: context.windows.NATGateway,
            })
          : undefined;

      records.push({
        kind: 'NATGateway',
        region: context.region,
        id: gateway.NatGatewayId,
        label: tags.Name ?? gateway.NatGatewayAddresses?.[0]?.PublicIp ?? '',
        state,
        createdAt: parseTimestamp(gateway.CreateTime),
        utilization,
        tags,
        vpcId: gateway.VpcId,
        subnetId: gateway.SubnetId,
      });
    }
    nextToken = response.NextToken;
  } while (nextToken);

  return records;
}
