/**
 * Resource age helpers.
 */

const MS_PER_DAY = 86_400_000;

/**
 * Parse a provider timestamp.
 *
 * @returns Date, or undefined when the value is missing or unparsable
 */
export function parseTimestamp(value: string | Date | undefined | null): Date | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Whole days elapsed between `createdAt` and `now`.
 *
 * Timestamps in the future (clock skew) count as 0 days old.
 *
 * @returns Age in days, or undefined when the creation time is unknown
 */
export function ageInDays(createdAt: Date | undefined, now: Date): number | undefined {
  if (!createdAt || Number.isNaN(createdAt.getTime())) {
    return undefined;
  }
  const elapsed = now.getTime() - createdAt.getTime();
  return Math.max(0, Math.floor(elapsed / MS_PER_DAY));
}
