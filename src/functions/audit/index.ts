/**
 * AWS Lambda handler for the scheduled audit.
 *
 * Loads configuration from SSM, scans and classifies, and returns per-kind
 * disposition counts. Read-only: this entry point never deletes anything.
 */

import type { Context } from 'aws-lambda';
import { classifyAll } from '@/classifier';
import { loadConfigFromSsm, selectedKinds, toThresholdConfig } from '@/core/config';
import { Scanner } from '@/inventory/scanner';
import { summarizeClassification } from '@/report';
import { errorMessage } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cloud-sweep:main');

// Default SSM parameter name (can be overridden via environment variable)
const DEFAULT_CONFIG_PARAMETER = '/cloud-sweep/config';

/**
 * Lambda event structure.
 */
export interface AuditEvent {
  /**
   * Narrows the scan to these regions instead of the configured ones.
   */
  regions?: unknown;
  [key: string]: unknown;
}

/**
 * Lambda response structure.
 */
export interface AuditResponse {
  statusCode: number;
  body: string;
}

function eventRegions(event: AuditEvent): string[] | undefined {
  if (!Array.isArray(event.regions)) return undefined;
  const regions = event.regions.filter(
    (region): region is string => typeof region === 'string' && region.length > 0
  );
  return regions.length > 0 ? regions : undefined;
}

/**
 * @example
 * Event:
 * { "regions": ["us-east-1"] }
 *
 * Response body:
 * { "total": 12, "delete_candidates": 3, "review_candidates": 2,
 *   "estimated_monthly_savings": 41.3, "by_kind": { ... }, ... }
 */
export async function main(event: AuditEvent, context: Context): Promise<AuditResponse> {
  const requestId = context.awsRequestId || 'local-test';
  const regionsOverride = eventRegions(event);

  logger.info({ requestId, regions: regionsOverride }, 'Lambda invoked');

  try {
    const configParameter = process.env.CONFIG_PARAMETER_NAME ?? DEFAULT_CONFIG_PARAMETER;
    const config = await loadConfigFromSsm(configParameter);
    const thresholds = toThresholdConfig(config);
    const now = new Date();

    const scanner = new Scanner({
      regions: regionsOverride ?? config.regions,
      kinds: selectedKinds(config),
      windows: thresholds.metricWindows,
    });
    const scan = await scanner.scan();

    const summary = summarizeClassification(classifyAll(scan.records, thresholds, now));

    logger.info(
      {
        requestId,
        total: summary.total,
        deleteCandidates: summary.deleteCandidates,
        failures: scan.failures.length,
      },
      'Audit completed'
    );

    return {
      statusCode: 200,
      body: JSON.stringify({
        regions: scan.regions,
        total: summary.total,
        delete_candidates: summary.deleteCandidates,
        review_candidates: summary.reviewCandidates,
        estimated_monthly_savings: summary.estimatedMonthlySavings,
        by_kind: summary.byKind,
        unencrypted_buckets: summary.unencryptedBuckets,
        failures: scan.failures,
        timestamp: now.toISOString(),
        request_id: requestId,
      }),
    };
  } catch (error) {
    logger.error({ error: String(error), requestId }, 'Audit failed');

    return {
      statusCode: 500,
      body: JSON.stringify({
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
        request_id: requestId,
      }),
    };
  }
}
