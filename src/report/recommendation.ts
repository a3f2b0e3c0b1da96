import type { Disposition, Verdict } from '@shared/types';

const DISPOSITIONS: readonly Disposition[] = ['DELETE', 'REVIEW', 'KEEP', 'IGNORE'];
const SEPARATOR = ' - ';

function isDisposition(value: string): value is Disposition {
  return DISPOSITIONS.some((d) => d === value);
}

/**
 * Join disposition and reason into the report's single Recommendation column.
 *
 * @example formatRecommendation({ disposition: 'DELETE', reason: 'Unattached volume' })
 *   → "DELETE - Unattached volume"
 */
export function formatRecommendation(verdict: Pick<Verdict, 'disposition' | 'reason'>): string {
  return verdict.reason ? `${verdict.disposition}${SEPARATOR}${verdict.reason}` : verdict.disposition;
}

/**
 * Split a Recommendation column back into disposition and reason.
 *
 * @returns undefined when the text does not start with a known disposition
 */
export function parseRecommendation(
  text: string
): Pick<Verdict, 'disposition' | 'reason'> | undefined {
  const trimmed = text.trim();
  const separator = trimmed.indexOf(SEPARATOR);
  const head = separator === -1 ? trimmed : trimmed.slice(0, separator);
  const disposition = head.trim().toUpperCase();

  if (!isDisposition(disposition)) {
    return undefined;
  }
  return {
    disposition,
    reason: separator === -1 ? '' : trimmed.slice(separator + SEPARATOR.length),
  };
}
