import { RDSClient, DescribeDBInstancesCommand } from '@aws-sdk/client-rds';
import type { ManagedDbRecord } from '@shared/types';
import { parseTimestamp } from '@shared/utils/age';
import { tagsFromList } from '@/inventory/types';
import type { CollectorContext } from '@/inventory/types';

export async function collectDbInstances(context: CollectorContext): Promise<ManagedDbRecord[]> {
  const rdsClient = new RDSClient({ region: context.region });
  const records: ManagedDbRecord[] = [];
  let marker: string | undefined;

  do {
    const response = await rdsClient.send(new DescribeDBInstancesCommand({ Marker: marker }));
    for (const db of response.DBInstances ?? []) {
      if (!db.DBInstanceIdentifier) continue;

      const state = db.DBInstanceStatus?.toLowerCase() ?? 'unknown';
      const utilization =
        state === 'available'
          ? await context.metrics.trailingAverage({
              namespace: 'AWS/RDS',
              metricName: 'DatabaseConnections',
              dimensions: [{ Name: 'DBInstanceIdentifier', Value: db.DBInstanceIdentifier }],
              statistic: 'Average',
              windowDays: context.windows.ManagedDB,
            })
          : undefined;

      records.push({
        kind: 'ManagedDB',
        region: context.region,
        id: db.DBInstanceIdentifier,
        label: db.DBInstanceIdentifier,
        state,
        createdAt: parseTimestamp(db.InstanceCreateTime),
        utilization,
        tags: tagsFromList(db.TagList),
        associatedId: db.DBClusterIdentifier,
        instanceClass: db.DBInstanceClass,
        engine: db.Engine,
        allocatedStorageGb: db.AllocatedStorage,
      });
    }
    marker = response.Marker;
  } while (marker);

  return records;
}
