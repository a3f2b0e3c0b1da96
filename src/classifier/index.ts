/**
 * Resource classifier.
 *
 * Turns one observed record into a DELETE / REVIEW / KEEP / IGNORE verdict.
 * Pure: the result depends only on the record, the thresholds and `now`.
 * Missing data never yields DELETE for an age-based rule.
 */

import { REMOVED_STATES } from '@/core/thresholds';
import type { ClassifiedResource, ResourceRecord, ThresholdConfig, Verdict } from '@shared/types';
import { ageInDays } from '@shared/utils/age';
import { estimateMonthlyCost, formatCostLabel } from './costTable';
import { evaluateRule } from './rules';

export function classify(record: ResourceRecord, thresholds: ThresholdConfig, now: Date): Verdict {
  const estimate = estimateMonthlyCost(record);
  const label = formatCostLabel(estimate);

  if (REMOVED_STATES.has(record.state)) {
    return {
      disposition: 'IGNORE',
      reason: `Resource is ${record.state}; ${label}`,
      estimatedMonthlyCost: estimate.amount,
    };
  }

  const decision = evaluateRule(record, {
    thresholds,
    ageDays: ageInDays(record.createdAt, now),
    windowDays: thresholds.metricWindows[record.kind],
  });

  return {
    disposition: decision.disposition,
    reason: `${decision.reason}; ${label}`,
    estimatedMonthlyCost: estimate.amount,
  };
}

/**
 * Classify records independently, preserving input order.
 */
export function classifyAll(
  records: readonly ResourceRecord[],
  thresholds: ThresholdConfig,
  now: Date
): ClassifiedResource[] {
  return records.map((record) => ({ record, verdict: classify(record, thresholds, now) }));
}

export { estimateMonthlyCost, formatCostLabel } from './costTable';
export type { CostBasis, CostEstimate } from './costTable';
