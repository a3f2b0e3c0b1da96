/**
 * Error classes shared across modules.
 *
 * Per-resource failures are turned into attempt outcomes by the executor;
 * these classes let it tell a backup problem from a provider rejection.
 */

/**
 * Raised when a backup could not be created.
 */
export class BackupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BackupError';
  }
}

/**
 * Raised when a backup was requested but its completion could not be verified.
 * The resource must not be deleted in this run.
 */
export class BackupUnconfirmedError extends BackupError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BackupUnconfirmedError';
  }
}

/**
 * Raised when a report file cannot be read back into classified resources.
 */
export class ReportFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReportFormatError';
  }
}

/**
 * Raised when the deletion executor is constructed with options it cannot run.
 */
export class ExecutorOptionsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExecutorOptionsError';
  }
}

/**
 * Returns the message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Checks whether an AWS SDK error means the resource does not exist.
 *
 * @param error - Thrown value
 * @param names - Service-specific error names (e.g. "InvalidVolume.NotFound")
 */
export function isNotFoundError(error: unknown, names: readonly string[]): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'name' in error &&
    typeof error.name === 'string' &&
    names.includes(error.name)
  );
}
