/**
 * Per-kind disposition counts of an audit, security findings, and the
 * plain-text summary report.
 */

import { RESOURCE_KINDS } from '@shared/types';
import type { ClassifiedResource, Disposition, ResourceKind } from '@shared/types';
import { REPORT_LAYOUT } from './layout';

export interface KindTally {
  total: number;
  dispositions: Record<Disposition, number>;

  /**
   * Sum of known estimated costs of DELETE candidates.
   */
  deleteSavings: number;
}

export interface AuditSummary {
  byKind: Record<ResourceKind, KindTally>;
  total: number;
  deleteCandidates: number;
  reviewCandidates: number;
  estimatedMonthlySavings: number;

  /**
   * "name (region)" of every bucket without default encryption.
   */
  unencryptedBuckets: string[];
}

function emptyTally(): KindTally {
  return { total: 0, dispositions: { DELETE: 0, REVIEW: 0, KEEP: 0, IGNORE: 0 }, deleteSavings: 0 };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarizeClassification(classified: readonly ClassifiedResource[]): AuditSummary {
  const byKind: Record<ResourceKind, KindTally> = {
    Instance: emptyTally(),
    Volume: emptyTally(),
    Snapshot: emptyTally(),
    FloatingIP: emptyTally(),
    LoadBalancer: emptyTally(),
    ManagedDB: emptyTally(),
    ServerlessFunction: emptyTally(),
    NATGateway: emptyTally(),
    ObjectBucket: emptyTally(),
  };

  const unencryptedBuckets: string[] = [];

  for (const { record, verdict } of classified) {
    if (record.kind === 'ObjectBucket' && record.encryption === 'None') {
      unencryptedBuckets.push(`${record.id} (${record.region})`);
    }
    const tally = byKind[record.kind];
    tally.total++;
    tally.dispositions[verdict.disposition]++;
    if (verdict.disposition === 'DELETE' && verdict.estimatedMonthlyCost !== undefined) {
      tally.deleteSavings = round2(tally.deleteSavings + verdict.estimatedMonthlyCost);
    }
  }

  let deleteCandidates = 0;
  let reviewCandidates = 0;
  let savings = 0;
  for (const kind of RESOURCE_KINDS) {
    deleteCandidates += byKind[kind].dispositions.DELETE;
    reviewCandidates += byKind[kind].dispositions.REVIEW;
    savings += byKind[kind].deleteSavings;
  }

  return {
    byKind,
    total: classified.length,
    deleteCandidates,
    reviewCandidates,
    estimatedMonthlySavings: round2(savings),
    unencryptedBuckets,
  };
}

/**
 * Render the 00_SUMMARY_REPORT.txt contents.
 */
export function formatSummaryReport(
  summary: AuditSummary,
  options: { generatedAt: Date; regions: readonly string[] }
): string {
  const lines: string[] = [
    'cloud-sweep resource audit',
    `Generated: ${options.generatedAt.toISOString()}`,
    `Regions: ${options.regions.length > 0 ? options.regions.join(', ') : 'none'}`,
    '',
    `${'Kind'.padEnd(22)}${'Total'.padStart(7)}${'DELETE'.padStart(8)}${'REVIEW'.padStart(8)}${'KEEP'.padStart(7)}${'IGNORE'.padStart(8)}  Est. DELETE savings`,
  ];

  for (const kind of RESOURCE_KINDS) {
    const tally = summary.byKind[kind];
    lines.push(
      `${REPORT_LAYOUT[kind].title.padEnd(22)}${String(tally.total).padStart(7)}${String(tally.dispositions.DELETE).padStart(8)}${String(tally.dispositions.REVIEW).padStart(8)}${String(tally.dispositions.KEEP).padStart(7)}${String(tally.dispositions.IGNORE).padStart(8)}  $${tally.deleteSavings.toFixed(2)}/month`
    );
  }

  lines.push(
    '',
    `Resources: ${summary.total}`,
    `DELETE candidates: ${summary.deleteCandidates}`,
    `REVIEW candidates: ${summary.reviewCandidates}`,
    `Estimated monthly savings from DELETE candidates: $${summary.estimatedMonthlySavings.toFixed(2)}`,
    '',
    `Unencrypted buckets: ${summary.unencryptedBuckets.length > 0 ? summary.unencryptedBuckets.length : 'none'}`,
    ...summary.unencryptedBuckets.map((bucket) => `  - ${bucket}`),
    '',
    'Costs are estimates from static list prices, not billing data.',
    'Next step: cloud-sweep cleanup --report <csv> (dry-run by default).',
    ''
  );
  return lines.join('\n');
}
