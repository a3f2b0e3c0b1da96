import type { MetricWindows, ResourceRecord } from '@shared/types';
import type { MetricsClient } from './metrics';

export interface CollectorContext {
  region: string;
  metrics: MetricsClient;
  windows: MetricWindows;
}

/**
 * Lists every resource of one kind in one region.
 */
export type Collector = (context: CollectorContext) => Promise<ResourceRecord[]>;

interface ProviderTag {
  Key?: string;
  Value?: string;
}

/**
 * Convert a provider tag list to a map. Entries without a key are dropped.
 */
export function tagsFromList(list: readonly ProviderTag[] | undefined): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const tag of list ?? []) {
    if (tag.Key) {
      tags[tag.Key] = tag.Value ?? '';
    }
  }
  return tags;
}
