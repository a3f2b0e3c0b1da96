function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Session id in UTC, `YYYYMMDD-HHMMSS`.
 */
export function createSessionId(now: Date = new Date()): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `-${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}
