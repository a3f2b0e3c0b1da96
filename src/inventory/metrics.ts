/**
 * Trailing-window utilization from CloudWatch.
 *
 * This is the one place where missing metric data is interpreted. A failed
 * query is always `undefined` ("unknown" to the classifier). An empty result
 * is `undefined` for gauges and 0 for counters: CloudWatch publishes no
 * datapoint for a period in which a counter (requests, invocations, bytes)
 * did not move.
 */

import {
  CloudWatchClient,
  GetMetricStatisticsCommand,
  type Datapoint,
  type Dimension,
} from '@aws-sdk/client-cloudwatch';
import type { Logger } from 'pino';
import { setupLogger } from '@shared/utils/logger';

const SECONDS_PER_DAY = 86_400;
const MS_PER_DAY = SECONDS_PER_DAY * 1000;

export interface MetricQuery {
  namespace: string;
  metricName: string;
  dimensions: Dimension[];

  /**
   * Average for gauges (CPU, connections), Sum for counters (requests,
   * invocations, bytes); with a one-day period a Sum reads as "per day".
   */
  statistic: 'Average' | 'Sum' | 'Maximum';

  windowDays: number;
}

function datapointValue(datapoint: Datapoint, statistic: MetricQuery['statistic']): number | undefined {
  switch (statistic) {
    case 'Average':
      return datapoint.Average;
    case 'Sum':
      return datapoint.Sum;
    case 'Maximum':
      return datapoint.Maximum;
  }
}

export class MetricsClient {
  private cloudWatchClient: CloudWatchClient;
  private logger: Logger;

  constructor(
    region: string,
    private now: () => Date = () => new Date()
  ) {
    this.cloudWatchClient = new CloudWatchClient({ region });
    this.logger = setupLogger('cloud-sweep:metrics');
  }

  /**
   * Mean of the daily values over the window.
   *
   * @returns undefined when the query fails, or when a gauge has no datapoints
   */
  async trailingAverage(query: MetricQuery): Promise<number | undefined> {
    const end = this.now();
    const start = new Date(end.getTime() - query.windowDays * MS_PER_DAY);

    try {
      const response = await this.cloudWatchClient.send(
        new GetMetricStatisticsCommand({
          Namespace: query.namespace,
          MetricName: query.metricName,
          Dimensions: query.dimensions,
          StartTime: start,
          EndTime: end,
          Period: SECONDS_PER_DAY,
          Statistics: [query.statistic],
        })
      );

      const values = (response.Datapoints ?? [])
        .map((datapoint) => datapointValue(datapoint, query.statistic))
        .filter((value): value is number => value !== undefined && Number.isFinite(value));

      if (values.length === 0) {
        return query.statistic === 'Sum' ? 0 : undefined;
      }
      return values.reduce((sum, value) => sum + value, 0) / values.length;
    } catch (error) {
      this.logger.warn(
        { namespace: query.namespace, metricName: query.metricName, dimensions: query.dimensions, error },
        'Metric query failed'
      );
      return undefined;
    }
  }
}
