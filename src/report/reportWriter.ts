/**
 * Writes the classified inventory as one CSV per kind plus a text summary.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { RESOURCE_KINDS } from '@shared/types';
import type { ClassifiedResource, ResourceKind } from '@shared/types';
import { ageInDays } from '@shared/utils/age';
import { setupLogger } from '@shared/utils/logger';
import { encodeTags } from '@shared/utils/tags';
import { formatSummaryReport, summarizeClassification } from './auditSummary';
import type { AuditSummary } from './auditSummary';
import { formatCsvRow } from './csv';
import { formatNumber, headerFor, kindCells, REPORT_LAYOUT } from './layout';
import { formatRecommendation } from './recommendation';

const logger = setupLogger('cloud-sweep:report');

export const SUMMARY_REPORT_FILE = '00_SUMMARY_REPORT.txt';

export interface WriteReportOptions {
  now: Date;
  regions: readonly string[];

  /**
   * Kinds to write a file for, even when empty. Defaults to every kind.
   */
  kinds?: readonly ResourceKind[];
}

export interface WrittenReport {
  directory: string;
  files: string[];
  summaryFile: string;
  summary: AuditSummary;
}

export function formatCost(amount: number | undefined): string {
  return amount === undefined ? 'unknown' : amount.toFixed(2);
}

/**
 * Render the CSV of one kind, rows in input order.
 */
export function formatKindReport(
  kind: ResourceKind,
  classified: readonly ClassifiedResource[],
  now: Date
): string {
  const header = headerFor(kind);
  const lines = [formatCsvRow(header)];

  for (const { record, verdict } of classified) {
    if (record.kind !== kind) continue;

    const cells: Record<string, string> = {
      Kind: record.kind,
      Region: record.region,
      ResourceId: record.id,
      Name: record.label,
      State: record.state,
      CreatedAt: record.createdAt ? record.createdAt.toISOString() : '',
      AgeDays: formatNumber(ageInDays(record.createdAt, now)),
      [REPORT_LAYOUT[kind].utilizationHeader]: formatNumber(record.utilization),
      ...kindCells(record),
      AssociatedId: record.associatedId ?? '',
      Tags: encodeTags(record.tags),
      Recommendation: formatRecommendation(verdict),
      EstMonthlyCost: formatCost(verdict.estimatedMonthlyCost),
    };
    lines.push(formatCsvRow(header.map((column) => cells[column] ?? '')));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Write every kind's CSV and the summary report into `directory`.
 */
export async function writeReports(
  classified: readonly ClassifiedResource[],
  directory: string,
  options: WriteReportOptions
): Promise<WrittenReport> {
  await mkdir(directory, { recursive: true });

  const kinds = options.kinds ?? RESOURCE_KINDS;
  const files: string[] = [];

  for (const kind of RESOURCE_KINDS) {
    if (!kinds.includes(kind)) continue;

    const file = path.join(directory, REPORT_LAYOUT[kind].file);
    await writeFile(file, formatKindReport(kind, classified, options.now), 'utf8');
    files.push(file);
  }

  const summary = summarizeClassification(classified);
  const summaryFile = path.join(directory, SUMMARY_REPORT_FILE);
  await writeFile(
    summaryFile,
    formatSummaryReport(summary, { generatedAt: options.now, regions: options.regions }),
    'utf8'
  );

  logger.info(
    { directory, files: files.length, deleteCandidates: summary.deleteCandidates },
    'Reports written'
  );

  return { directory, files, summaryFile, summary };
}
