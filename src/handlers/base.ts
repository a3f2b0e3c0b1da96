/**
 * Core types and utilities for deletion handlers.
 *
 * Each handler wraps the provider calls for one resource kind: reading the
 * live state, taking a backup and performing the destructive action. Handlers
 * make no safety decisions; the executor's gates do.
 */

import { setTimeout } from 'timers/promises';
import type { Logger } from 'pino';
import { BackupUnconfirmedError, errorMessage } from '@shared/errors';
import type { BackupResult, ResourceRecord } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

/**
 * Limits for polling a backup until the provider reports it complete.
 */
export interface BackupWaitOptions {
  maxAttempts: number;
  delaySeconds: number;
}

export const DEFAULT_BACKUP_WAIT: BackupWaitOptions = { maxAttempts: 40, delaySeconds: 15 };

export interface HandlerContext {
  sessionId: string;
  backupWait: BackupWaitOptions;
}

/**
 * Provider operations for one resource.
 */
export interface DeletionHandler {
  /**
   * Current provider state, lower-cased.
   *
   * @returns undefined when the resource no longer exists
   */
  readState(): Promise<string | undefined>;

  /**
   * Create a backup and wait until the provider confirms it.
   *
   * @throws {BackupUnconfirmedError} If completion cannot be verified
   */
  backup(): Promise<BackupResult>;

  destroy(): Promise<void>;
}

export type PollStatus = 'complete' | 'pending' | 'failed';

/**
 * Poll `check` until it reports complete.
 *
 * @param description - What is being waited for, used in errors and logs
 * @throws {BackupUnconfirmedError} On a failed state, a check error, or after `maxAttempts` checks
 */
export async function waitForBackup(
  check: () => Promise<PollStatus>,
  wait: BackupWaitOptions,
  description: string,
  logger: Logger
): Promise<void> {
  for (let attempt = 1; attempt <= wait.maxAttempts; attempt++) {
    let status: PollStatus;
    try {
      status = await check();
    } catch (error) {
      throw new BackupUnconfirmedError(
        `Could not verify ${description}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (status === 'complete') {
      logger.debug({ description, attempt }, 'Backup confirmed');
      return;
    }
    if (status === 'failed') {
      throw new BackupUnconfirmedError(`${description} entered a failed state`);
    }

    logger.debug({ description, attempt, maxAttempts: wait.maxAttempts }, 'Backup pending');
    if (attempt < wait.maxAttempts) {
      await setTimeout(wait.delaySeconds * 1000);
    }
  }

  throw new BackupUnconfirmedError(
    `${description} not complete after ${wait.maxAttempts} checks`
  );
}

/**
 * Shared plumbing for handlers.
 *
 * The default backup exports the resource's configuration: for kinds with no
 * data to preserve, the exported description is the recovery artifact.
 */
export abstract class BaseDeletionHandler<R extends ResourceRecord> implements DeletionHandler {
  protected logger: Logger;

  constructor(
    protected record: R,
    protected context: HandlerContext
  ) {
    this.logger = setupLogger(`cloud-sweep:handler.${record.kind}`);
  }

  abstract readState(): Promise<string | undefined>;

  abstract destroy(): Promise<void>;

  /**
   * Live provider description included in a configuration export.
   */
  protected abstract describe(): Promise<Record<string, unknown>>;

  async backup(): Promise<BackupResult> {
    const live = await this.describe();
    return {
      ref: `config-export:${this.record.kind}:${this.record.region}:${this.record.id}`,
      type: 'config-export',
      configuration: {
        kind: this.record.kind,
        region: this.record.region,
        id: this.record.id,
        label: this.record.label,
        tags: { ...this.record.tags },
        live,
      },
    };
  }

  /**
   * Tags put on backup artifacts.
   */
  protected backupTags(): { Key: string; Value: string }[] {
    return [
      { Key: 'DeletionSession', Value: this.context.sessionId },
      { Key: 'OriginalResource', Value: this.record.id },
      { Key: 'CreatedBy', Value: 'cloud-sweep' },
    ];
  }

  /**
   * Name for a backup artifact: letters, digits and single hyphens, starting with a letter.
   */
  protected backupName(): string {
    const raw = `cloud-sweep-${this.record.id}-${this.context.sessionId}`;
    return raw
      .replace(/[^A-Za-z0-9-]/g, '-')
      .replace(/-+/g, '-')
      .replace(/-$/, '');
  }
}
