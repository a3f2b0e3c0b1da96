import type { Disposition, ThresholdConfig } from '@shared/types';

/**
 * Inputs a rule may read besides the record itself.
 */
export interface RuleContext {
  thresholds: ThresholdConfig;

  /**
   * Whole days since creation, computed once by the classifier. Undefined when unknown.
   */
  ageDays?: number;

  /**
   * Trailing metric window (days) for the record's kind.
   */
  windowDays: number;
}

/**
 * What a rule decided, before the cost label is attached.
 */
export interface RuleDecision {
  disposition: Disposition;
  reason: string;
}
