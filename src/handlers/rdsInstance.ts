/**
 * Managed database handler for RDS DB instances.
 *
 * Backup is a manual DB snapshot, confirmed once its status is "available".
 */

import {
  RDSClient,
  CreateDBSnapshotCommand,
  DeleteDBInstanceCommand,
  DescribeDBInstancesCommand,
  DescribeDBSnapshotsCommand,
  type DBInstance,
} from '@aws-sdk/client-rds';
import { BackupError, isNotFoundError } from '@shared/errors';
import type { BackupResult, ManagedDbRecord } from '@shared/types';
import { BaseDeletionHandler, waitForBackup } from './base';
import type { HandlerContext } from './base';

const NOT_FOUND = ['DBInstanceNotFoundFault', 'DBInstanceNotFound'];
const FAILED_SNAPSHOT_STATES = ['failed', 'incompatible-restore', 'incompatible-parameters'];

export class RdsInstanceHandler extends BaseDeletionHandler<ManagedDbRecord> {
  private rdsClient: RDSClient;
  private dbInstanceIdentifier: string;

  constructor(record: ManagedDbRecord, context: HandlerContext) {
    super(record, context);
    this.rdsClient = new RDSClient({ region: record.region });

    // ARN format: arn:aws:rds:region:account:db:instance-id
    this.dbInstanceIdentifier = record.id.includes(':db:') ? record.id.split(':db:')[1] : record.id;
  }

  private async getInstance(): Promise<DBInstance | undefined> {
    const response = await this.rdsClient.send(
      new DescribeDBInstancesCommand({ DBInstanceIdentifier: this.dbInstanceIdentifier })
    );
    return response.DBInstances?.[0];
  }

  async readState(): Promise<string | undefined> {
    try {
      const instance = await this.getInstance();
      return instance?.DBInstanceStatus?.toLowerCase();
    } catch (error) {
      if (isNotFoundError(error, NOT_FOUND)) {
        return undefined;
      }
      this.logger.error(
        { db_instance: this.dbInstanceIdentifier, error },
        'Failed to get status for DB instance'
      );
      throw error;
    }
  }

  protected async describe(): Promise<Record<string, unknown>> {
    return { dbInstance: (await this.getInstance()) ?? null };
  }

  async backup(): Promise<BackupResult> {
    const snapshotId = this.backupName();

    this.logger.info(
      { db_instance: this.dbInstanceIdentifier, snapshot_id: snapshotId },
      'Creating DB snapshot before deletion'
    );

    const response = await this.rdsClient.send(
      new CreateDBSnapshotCommand({
        DBInstanceIdentifier: this.dbInstanceIdentifier,
        DBSnapshotIdentifier: snapshotId,
        Tags: this.backupTags(),
      })
    );
    if (!response.DBSnapshot) {
      throw new BackupError(`CreateDBSnapshot returned no snapshot for ${this.dbInstanceIdentifier}`);
    }

    await waitForBackup(
      async () => {
        const snapshots = await this.rdsClient.send(
          new DescribeDBSnapshotsCommand({ DBSnapshotIdentifier: snapshotId })
        );
        const status = snapshots.DBSnapshots?.[0]?.Status?.toLowerCase();
        if (status === 'available') return 'complete';
        if (status && FAILED_SNAPSHOT_STATES.includes(status)) return 'failed';
        return 'pending';
      },
      this.context.backupWait,
      `DB snapshot ${snapshotId}`,
      this.logger
    );

    return { ref: snapshotId, type: 'db-snapshot' };
  }

  /**
   * Deletes without a final snapshot; the explicit backup step covers that.
   * Automated backups are retained.
   */
  async destroy(): Promise<void> {
    await this.rdsClient.send(
      new DeleteDBInstanceCommand({
        DBInstanceIdentifier: this.dbInstanceIdentifier,
        SkipFinalSnapshot: true,
        DeleteAutomatedBackups: false,
      })
    );
    this.logger.info({ db_instance: this.dbInstanceIdentifier }, 'Issued delete command for DB instance');
  }
}
