/**
 * Load balancer collectors: ELBv2 (application, network, gateway) and classic.
 */

import {
  ElasticLoadBalancingV2Client,
  DescribeLoadBalancersCommand,
  DescribeTagsCommand,
  type LoadBalancer,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import {
  ElasticLoadBalancingClient,
  DescribeLoadBalancersCommand as DescribeClassicLoadBalancersCommand,
  DescribeTagsCommand as DescribeClassicTagsCommand,
} from '@aws-sdk/client-elastic-load-balancing';
import type { LoadBalancerRecord, LoadBalancerType } from '@shared/types';
import { parseTimestamp } from '@shared/utils/age';
import type { MetricQuery } from '@/inventory/metrics';
import { tagsFromList } from '@/inventory/types';
import type { CollectorContext } from '@/inventory/types';

// DescribeTags accepts at most 20 load balancers per call.
const TAG_BATCH_SIZE = 20;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function v2Type(lb: LoadBalancer): LoadBalancerType {
  switch (lb.Type) {
    case 'network':
      return 'network';
    case 'gateway':
      return 'gateway';
    default:
      return 'application';
  }
}

/**
 * CloudWatch dimension value for an ELBv2 ARN: the part after "loadbalancer/",
 * e.g. "app/my-alb/50dc6c495c0c9188".
 */
export function loadBalancerDimension(arn: string): string {
  const marker = ':loadbalancer/';
  const index = arn.indexOf(marker);
  return index === -1 ? arn : arn.slice(index + marker.length);
}

function activityQuery(
  lbType: LoadBalancerType,
  arn: string,
  windowDays: number
): MetricQuery | undefined {
  const dimensions = [{ Name: 'LoadBalancer', Value: loadBalancerDimension(arn) }];
  switch (lbType) {
    case 'application':
      return { namespace: 'AWS/ApplicationELB', metricName: 'RequestCount', dimensions, statistic: 'Sum', windowDays };
    case 'network':
      return { namespace: 'AWS/NetworkELB', metricName: 'NewFlowCount', dimensions, statistic: 'Sum', windowDays };
    case 'gateway':
      return { namespace: 'AWS/GatewayELB', metricName: 'NewFlowCount', dimensions, statistic: 'Sum', windowDays };
    case 'classic':
      return undefined;
  }
}

export async function collectElbV2(context: CollectorContext): Promise<LoadBalancerRecord[]> {
  const elbClient = new ElasticLoadBalancingV2Client({ region: context.region });

  const loadBalancers: LoadBalancer[] = [];
  let marker: string | undefined;
  do {
    const response = await elbClient.send(new DescribeLoadBalancersCommand({ Marker: marker }));
    loadBalancers.push(...(response.LoadBalancers ?? []));
    marker = response.NextMarker;
  } while (marker);

  const arns = loadBalancers.flatMap((lb) => (lb.LoadBalancerArn ? [lb.LoadBalancerArn] : []));
  const tagsByArn = new Map<string, Record<string, string>>();
  for (const batch of chunk(arns, TAG_BATCH_SIZE)) {
    const response = await elbClient.send(new DescribeTagsCommand({ ResourceArns: batch }));
    for (const description of response.TagDescriptions ?? []) {
      if (description.ResourceArn) {
        tagsByArn.set(description.ResourceArn, tagsFromList(description.Tags));
      }
    }
  }

  const records: LoadBalancerRecord[] = [];
  for (const lb of loadBalancers) {
    if (!lb.LoadBalancerArn) continue;

    const lbType = v2Type(lb);
    const query = activityQuery(lbType, lb.LoadBalancerArn, context.windows.LoadBalancer);
    records.push({
      kind: 'LoadBalancer',
      region: context.region,
      id: lb.LoadBalancerArn,
      label: lb.LoadBalancerName ?? '',
      state: lb.State?.Code?.toLowerCase() ?? 'unknown',
      createdAt: parseTimestamp(lb.CreatedTime),
      utilization: query ? await context.metrics.trailingAverage(query) : undefined,
      tags: tagsByArn.get(lb.LoadBalancerArn) ?? {},
      lbType,
      arn: lb.LoadBalancerArn,
    });
  }

  return records;
}

/**
 * Classic load balancers have no lifecycle state; listed ones are "active".
 */
export async function collectClassicElb(context: CollectorContext): Promise<LoadBalancerRecord[]> {
  const elbClient = new ElasticLoadBalancingClient({ region: context.region });

  const records: LoadBalancerRecord[] = [];
  let marker: string | undefined;
  do {
    const response = await elbClient.send(new DescribeClassicLoadBalancersCommand({ Marker: marker }));
    for (const lb of response.LoadBalancerDescriptions ?? []) {
      if (!lb.LoadBalancerName) continue;

      records.push({
        kind: 'LoadBalancer',
        region: context.region,
        id: lb.LoadBalancerName,
        label: lb.LoadBalancerName,
        state: 'active',
        createdAt: parseTimestamp(lb.CreatedTime),
        utilization: await context.metrics.trailingAverage({
          namespace: 'AWS/ELB',
          metricName: 'RequestCount',
          dimensions: [{ Name: 'LoadBalancerName', Value: lb.LoadBalancerName }],
          statistic: 'Sum',
          windowDays: context.windows.LoadBalancer,
        }),
        tags: {},
        lbType: 'classic',
      });
    }
    marker = response.NextMarker;
  } while (marker);

  for (const batch of chunk(records, TAG_BATCH_SIZE)) {
    const response = await elbClient.send(
      new DescribeClassicTagsCommand({ LoadBalancerNames: batch.map((record) => record.id) })
    );
    for (const description of response.TagDescriptions ?? []) {
      const record = batch.find((r) => r.id === description.LoadBalancerName);
      if (record) {
        record.tags = tagsFromList(description.Tags);
      }
    }
  }

  return records;
}

export async function collectLoadBalancers(context: CollectorContext): Promise<LoadBalancerRecord[]> {
  const v2 = await collectElbV2(context);
  const classic = await collectClassicElb(context);
  return [...v2, ...classic];
}
