/**
 * Safety gates of the deletion pipeline.
 *
 * Each gate either passes or names the protection that stopped the resource.
 * Gates never throw and never call the provider.
 */

import { DELETABLE_STATES } from '@/core/thresholds';
import type { ProtectionState, ResourceRecord } from '@shared/types';
import { ageInDays } from '@shared/utils/age';
import { findProtectingPattern, formatTagPattern } from '@shared/utils/tags';
import type { TagPattern } from '@shared/utils/tags';

export type GateResult =
  | { passed: true }
  | { passed: false; protectionState: Exclude<ProtectionState, 'Unprotected'>; detail: string };

const PASSED: GateResult = { passed: true };

/**
 * Both the reported state and the live state must be deletable for the kind.
 *
 * @param liveState - Current provider state; undefined when the resource is gone
 */
export function checkState(record: ResourceRecord, liveState: string | undefined): GateResult {
  const deletable = DELETABLE_STATES[record.kind];

  if (!deletable.includes(record.state)) {
    return {
      passed: false,
      protectionState: 'ProtectedByState',
      detail: `Reported state "${record.state}" is not deletable (expected ${deletable.join(' or ')})`,
    };
  }
  if (liveState === undefined) {
    return {
      passed: false,
      protectionState: 'ProtectedByState',
      detail: 'Resource no longer exists',
    };
  }
  if (!deletable.includes(liveState)) {
    return {
      passed: false,
      protectionState: 'ProtectedByState',
      detail: `Current state "${liveState}" is not deletable (expected ${deletable.join(' or ')})`,
    };
  }
  return PASSED;
}

/**
 * A minimum of 0 always passes. Otherwise an unknown age fails.
 */
export function checkAge(record: ResourceRecord, now: Date, minDays: number): GateResult {
  if (minDays <= 0) {
    return PASSED;
  }

  const age = ageInDays(record.createdAt, now);
  if (age === undefined) {
    return {
      passed: false,
      protectionState: 'ProtectedByAge',
      detail: `Age unknown, minimum is ${minDays} days`,
    };
  }
  if (age < minDays) {
    return {
      passed: false,
      protectionState: 'ProtectedByAge',
      detail: `${age} days old, minimum is ${minDays} days`,
    };
  }
  return PASSED;
}

export function checkTags(record: ResourceRecord, patterns: readonly TagPattern[]): GateResult {
  const match = findProtectingPattern(record.tags, patterns);
  if (!match) {
    return PASSED;
  }
  return {
    passed: false,
    protectionState: 'ProtectedByTag',
    detail: `Protected by tag ${formatTagPattern(match)}`,
  };
}
