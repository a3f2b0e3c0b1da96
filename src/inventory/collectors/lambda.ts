import { LambdaClient, ListFunctionsCommand, ListTagsCommand } from '@aws-sdk/client-lambda';
import type { ServerlessFunctionRecord } from '@shared/types';
import { parseTimestamp } from '@shared/utils/age';
import type { CollectorContext } from '@/inventory/types';

/**
 * Lambda reports LastModified as "2024-01-15T10:30:00.000+0000"; add the
 * colon to the offset so Date parses it everywhere.
 */
export function parseLastModified(value: string | undefined): Date | undefined {
  return parseTimestamp(value?.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
}

/**
 * Functions are aged by last modification, the closest thing to "last deployed".
 */
export async function collectFunctions(context: CollectorContext): Promise<ServerlessFunctionRecord[]> {
  const lambdaClient = new LambdaClient({ region: context.region });
  const records: ServerlessFunctionRecord[] = [];
  let marker: string | undefined;

  do {
    const response = await lambdaClient.send(new ListFunctionsCommand({ Marker: marker }));
    for (const fn of response.Functions ?? []) {
      if (!fn.FunctionName) continue;

      const tags = fn.FunctionArn
        ? ((await lambdaClient.send(new ListTagsCommand({ Resource: fn.FunctionArn }))).Tags ?? {})
        : {};

      records.push({
        kind: 'ServerlessFunction',
        region: context.region,
        id: fn.FunctionName,
        label: fn.FunctionName,
        state: fn.State?.toLowerCase() ?? 'active',
        createdAt: parseLastModified(fn.LastModified),
        utilization: await context.metrics.trailingAverage({
          namespace: 'AWS/Lambda',
          metricName: 'Invocations',
          dimensions: [{ Name: 'FunctionName', Value: fn.FunctionName }],
          statistic: 'Sum',
          windowDays: context.windows.ServerlessFunction,
        }),
        tags,
        runtime: fn.Runtime,
        memoryMb: fn.MemorySize,
      });
    }
    marker = response.NextMarker;
  } while (marker);

  return records;
}
