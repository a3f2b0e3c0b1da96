/**
 * Unit tests for handlers/ebsVolume.ts and handlers/ebsSnapshot.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  EC2Client,
  CreateSnapshotCommand,
  DeleteSnapshotCommand,
  DeleteVolumeCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
} from '@aws-sdk/client-ec2';
import { EbsSnapshotHandler } from '@/handlers/ebsSnapshot';
import { EbsVolumeHandler } from '@/handlers/ebsVolume';
import type { HandlerContext } from '@/handlers/base';
import { awsError } from '../../helpers/awsError';
import { snapshot, volume } from '../../helpers/fixtures';

const ec2Mock = mockClient(EC2Client);

const context: HandlerContext = {
  sessionId: '20260301-000000',
  backupWait: { maxAttempts: 2, delaySeconds: 0 },
};

describe('EbsVolumeHandler', () => {
  let handler: EbsVolumeHandler;

  beforeEach(() => {
    ec2Mock.reset();
    handler = new EbsVolumeHandler(volume(), context);
  });

  it('reads the volume state', async () => {
    ec2Mock.on(DescribeVolumesCommand).resolves({ Volumes: [{ VolumeId: 'vol-0abc123', State: 'in-use' }] });

    await expect(handler.readState()).resolves.toBe('in-use');
  });

  it('returns undefined for a deleted volume', async () => {
    ec2Mock.on(DescribeVolumesCommand).rejects(awsError('InvalidVolume.NotFound'));

    await expect(handler.readState()).resolves.toBeUndefined();
  });

  it('snapshots the volume before deletion', async () => {
    ec2Mock.on(CreateSnapshotCommand).resolves({ SnapshotId: 'snap-0backup' });
    ec2Mock.on(DescribeSnapshotsCommand).resolves({ Snapshots: [{ State: 'completed' }] });

    await expect(handler.backup()).resolves.toEqual({ ref: 'snap-0backup', type: 'volume-snapshot' });
    expect(ec2Mock.commandCalls(CreateSnapshotCommand)[0].args[0].input.Description).toBe(
      'Backup of vol-0abc123 before deletion (session 20260301-000000)'
    );
    expect(ec2Mock.commandCalls(DescribeSnapshotsCommand)[0].args[0].input).toEqual({
      SnapshotIds: ['snap-0backup'],
    });
  });

  it('reports a snapshot in the error state', async () => {
    ec2Mock.on(CreateSnapshotCommand).resolves({ SnapshotId: 'snap-0backup' });
    ec2Mock.on(DescribeSnapshotsCommand).resolves({ Snapshots: [{ State: 'error' }] });

    await expect(handler.backup()).rejects.toThrow('snapshot snap-0backup entered a failed state');
  });

  it('reports a check that cannot be made', async () => {
    ec2Mock.on(CreateSnapshotCommand).resolves({ SnapshotId: 'snap-0backup' });
    ec2Mock.on(DescribeSnapshotsCommand).rejects(awsError('RequestLimitExceeded', 'throttled'));

    await expect(handler.backup()).rejects.toThrow('Could not verify snapshot snap-0backup: throttled');
  });

  it('deletes the volume', async () => {
    ec2Mock.on(DeleteVolumeCommand).resolves({});

    await handler.destroy();

    expect(ec2Mock.commandCalls(DeleteVolumeCommand)[0].args[0].input).toEqual({ VolumeId: 'vol-0abc123' });
  });
});

describe('EbsSnapshotHandler', () => {
  let handler: EbsSnapshotHandler;

  beforeEach(() => {
    ec2Mock.reset();
    handler = new EbsSnapshotHandler(snapshot(), context);
  });

  it('reads the snapshot state', async () => {
    ec2Mock.on(DescribeSnapshotsCommand).resolves({ Snapshots: [{ State: 'completed' }] });

    await expect(handler.readState()).resolves.toBe('completed');
  });

  it('returns undefined once the snapshot is gone', async () => {
    ec2Mock.on(DescribeSnapshotsCommand).rejects(awsError('InvalidSnapshot.NotFound'));

    await expect(handler.readState()).resolves.toBeUndefined();
  });

  it('exports the snapshot description as its backup', async () => {
    ec2Mock.on(DescribeSnapshotsCommand).resolves({ Snapshots: [{ SnapshotId: 'snap-0abc123', VolumeSize: 20 }] });

    const result = await handler.backup();

    expect(result.ref).toBe('config-export:Snapshot:us-east-1:snap-0abc123');
    expect(result.type).toBe('config-export');
    expect(result.configuration).toMatchObject({
      kind: 'Snapshot',
      id: 'snap-0abc123',
      label: 'nightly',
      live: { snapshot: { SnapshotId: 'snap-0abc123', VolumeSize: 20 } },
    });
  });

  it('deletes the snapshot', async () => {
    ec2Mock.on(DeleteSnapshotCommand).resolves({});

    await handler.destroy();

    expect(ec2Mock.commandCalls(DeleteSnapshotCommand)[0].args[0].input).toEqual({ SnapshotId: 'snap-0abc123' });
  });
});
