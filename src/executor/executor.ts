/**
 * Deletion executor.
 *
 * Processes DELETE rows in input order through a fixed pipeline:
 * state → age → tags → confirmation (interactive) → backup (optional) → destroy.
 * The first failing step decides the outcome. Every processed row yields
 * exactly one attempt in the audit trail; no per-resource error stops the run.
 */

import type { Logger } from 'pino';
import { DEFAULT_THRESHOLDS, minimumAgeForKind } from '@/core/thresholds';
import { DEFAULT_BACKUP_WAIT } from '@/handlers/base';
import type { BackupWaitOptions, DeletionHandler } from '@/handlers/base';
import { getHandler } from '@/handlers/factory';
import type { HandlerFactory } from '@/handlers/factory';
import { errorMessage, ExecutorOptionsError } from '@shared/errors';
import type {
  ClassifiedResource,
  DeletionAttempt,
  ExecutionSummary,
  ExecutorOptions,
  StopReason,
  ThresholdConfig,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { parseTagPatterns } from '@shared/utils/tags';
import type { TagPattern } from '@shared/utils/tags';
import { AuditTrail } from './audit';
import { MemoryBackupManifest } from './backupManifest';
import type { BackupManifest } from './backupManifest';
import { checkAge, checkState, checkTags } from './gates';
import type { ConfirmationAnswer, ConfirmationPrompt } from './prompt';
import { createSessionId } from './session';
import { summarizeAttempts } from './summary';

export interface ExecutorDependencies {
  handlerFactory?: HandlerFactory;

  /**
   * Required in interactive mode.
   */
  prompt?: ConfirmationPrompt;

  auditTrail?: AuditTrail;
  backupManifest?: BackupManifest;

  /**
   * Supplies the run's reference time and attempt timestamps.
   */
  clock?: () => Date;

  sessionId?: string;

  /**
   * Source of the per-kind minimum ages of the age gate.
   */
  thresholds?: ThresholdConfig;

  backupWait?: BackupWaitOptions;
}

export interface ExecutionResult {
  attempts: readonly DeletionAttempt[];
  summary: ExecutionSummary;
}

type AttemptStart = Pick<
  DeletionAttempt,
  'sessionId' | 'sequence' | 'mode' | 'record' | 'estimatedMonthlyCost' | 'startedAt'
>;

type AttemptEnd = Omit<DeletionAttempt, keyof AttemptStart | 'finishedAt'>;

type ItemResult = { attempt: DeletionAttempt; stop?: StopReason };

export class DeletionExecutor {
  readonly sessionId: string;

  private logger: Logger;
  private handlerFactory: HandlerFactory;
  private prompt?: ConfirmationPrompt;
  private auditTrail: AuditTrail;
  private backupManifest: BackupManifest;
  private clock: () => Date;
  private thresholds: ThresholdConfig;
  private backupWait: BackupWaitOptions;
  private tagPatterns: TagPattern[];

  constructor(
    private options: ExecutorOptions,
    dependencies: ExecutorDependencies = {}
  ) {
    if (options.mode === 'interactive' && !dependencies.prompt) {
      throw new ExecutorOptionsError('Interactive mode requires a confirmation prompt');
    }
    if (options.maxResourcesThisRun !== undefined && options.maxResourcesThisRun < 0) {
      throw new ExecutorOptionsError('maxResourcesThisRun must not be negative');
    }

    this.clock = dependencies.clock ?? (() => new Date());
    this.sessionId = dependencies.sessionId ?? createSessionId(this.clock());
    this.handlerFactory = dependencies.handlerFactory ?? getHandler;
    this.prompt = dependencies.prompt;
    this.auditTrail = dependencies.auditTrail ?? new AuditTrail();
    this.backupManifest = dependencies.backupManifest ?? new MemoryBackupManifest();
    this.thresholds = dependencies.thresholds ?? DEFAULT_THRESHOLDS;
    this.backupWait = dependencies.backupWait ?? DEFAULT_BACKUP_WAIT;
    this.tagPatterns = parseTagPatterns(options.protectTagPatterns);
    this.logger = setupLogger('cloud-sweep:executor');
  }

  /**
   * Process the DELETE rows of `items`; other dispositions are not touched.
   *
   * @throws If an audit sink cannot be written; no further resource is processed
   */
  async run(items: readonly ClassifiedResource[]): Promise<ExecutionResult> {
    const queue = items.filter((item) => item.verdict.disposition === 'DELETE');
    const runStartedAt = this.clock();
    const attempts: DeletionAttempt[] = [];
    let stopReason: StopReason | undefined;

    this.logger.info(
      {
        sessionId: this.sessionId,
        mode: this.options.mode,
        backupBeforeDelete: this.options.backupBeforeDelete,
        candidates: queue.length,
        ignored: items.length - queue.length,
      },
      'Deletion run started'
    );

    for (const [index, item] of queue.entries()) {
      const limit = this.options.maxResourcesThisRun;
      if (limit !== undefined && attempts.length >= limit) {
        stopReason = 'max-resources';
        this.logger.info({ limit }, 'Resource limit reached, stopping intake');
        break;
      }

      const { attempt, stop } = await this.processItem(item, index + 1, queue.length, runStartedAt);
      attempts.push(attempt);
      await this.auditTrail.append(attempt);

      this.logger.info(
        {
          sequence: attempt.sequence,
          kind: attempt.record.kind,
          resourceId: attempt.record.id,
          outcome: attempt.outcome,
          protectionState: attempt.protectionState,
          backupRef: attempt.backupRef,
        },
        attempt.detail
      );

      if (stop) {
        stopReason = stop;
        this.logger.info({ sequence: attempt.sequence }, 'Run stopped by operator');
        break;
      }
    }

    const summary = summarizeAttempts(attempts, {
      sessionId: this.sessionId,
      mode: this.options.mode,
      notProcessed: queue.length - attempts.length,
      stopReason,
    });

    this.logger.info({ ...summary }, 'Deletion run finished');
    return { attempts, summary };
  }

  private async processItem(
    item: ClassifiedResource,
    sequence: number,
    total: number,
    runStartedAt: Date
  ): Promise<ItemResult> {
    const { record, verdict } = item;
    const start: AttemptStart = {
      sessionId: this.sessionId,
      sequence,
      mode: this.options.mode,
      record,
      estimatedMonthlyCost: verdict.estimatedMonthlyCost,
      startedAt: this.clock().toISOString(),
    };
    const finish = (end: AttemptEnd): DeletionAttempt => ({
      ...start,
      ...end,
      finishedAt: this.clock().toISOString(),
    });

    const handler: DeletionHandler = this.handlerFactory(record, {
      sessionId: this.sessionId,
      backupWait: this.backupWait,
    });

    // 1. State validity, against the report row and the provider.
    let liveState: string | undefined;
    try {
      liveState = await handler.readState();
    } catch (error) {
      return {
        attempt: finish({
          protectionState: 'ProtectedByState',
          outcome: 'Skipped',
          skipGate: 'state',
          detail: `Could not read current state: ${errorMessage(error)}`,
        }),
      };
    }

    const stateGate = checkState(record, liveState);
    if (!stateGate.passed) {
      return {
        attempt: finish({
          protectionState: stateGate.protectionState,
          outcome: 'Skipped',
          skipGate: 'state',
          detail: stateGate.detail,
        }),
      };
    }

    // 2. Age.
    const minDays = this.options.minAgeDaysOverride ?? minimumAgeForKind(record.kind, this.thresholds);
    const ageGate = checkAge(record, runStartedAt, minDays);
    if (!ageGate.passed) {
      return {
        attempt: finish({
          protectionState: ageGate.protectionState,
          outcome: 'Skipped',
          skipGate: 'age',
          detail: ageGate.detail,
        }),
      };
    }

    // 3. Tag protection.
    const tagGate = checkTags(record, this.tagPatterns);
    if (!tagGate.passed) {
      return {
        attempt: finish({
          protectionState: tagGate.protectionState,
          outcome: 'Skipped',
          skipGate: 'tag',
          detail: tagGate.detail,
        }),
      };
    }

    // 4. Confirmation.
    if (this.options.mode === 'interactive' && this.prompt) {
      let answer: ConfirmationAnswer;
      try {
        answer = await this.prompt.confirm({ sequence, total, record, verdict });
      } catch (error) {
        this.logger.warn({ error }, 'Confirmation prompt failed, stopping');
        answer = 'quit';
      }

      if (answer === 'quit') {
        return {
          attempt: finish({
            protectionState: 'Unprotected',
            outcome: 'Skipped',
            skipGate: 'quit',
            detail: 'Operator quit; remaining resources not processed',
          }),
          stop: 'user-quit',
        };
      }
      if (answer === 'no') {
        return {
          attempt: finish({
            protectionState: 'Unprotected',
            outcome: 'Skipped',
            skipGate: 'confirmation',
            detail: 'Declined by operator',
          }),
        };
      }
    }

    // 5. Backup, confirmed before anything irreversible happens.
    let backupRef: string | undefined;
    if (this.options.backupBeforeDelete) {
      if (this.options.mode === 'dry-run') {
        backupRef = `dryrun-backup-${sequence}`;
      } else {
        try {
          const backup = await handler.backup();
          await this.backupManifest.append({
            sessionId: this.sessionId,
            sequence,
            kind: record.kind,
            region: record.region,
            resourceId: record.id,
            backupRef: backup.ref,
            backupType: backup.type,
            configuration: backup.configuration,
            createdAt: this.clock().toISOString(),
          });
          backupRef = backup.ref;
        } catch (error) {
          return {
            attempt: finish({
              protectionState: 'Unprotected',
              outcome: 'Failed',
              failureStage: 'backup',
              failureReason: errorMessage(error),
              detail: `Backup failed, resource left in place: ${errorMessage(error)}`,
            }),
          };
        }
      }
    }

    // 6. Destructive action.
    if (this.options.mode === 'dry-run') {
      const simulatedActionId = `dryrun-${this.sessionId}-${sequence}`;
      return {
        attempt: finish({
          protectionState: 'Unprotected',
          backupRef,
          outcome: 'DryRunSimulated',
          simulatedActionId,
          detail: `Would delete ${record.kind} ${record.id}`,
        }),
      };
    }

    try {
      await handler.destroy();
    } catch (error) {
      return {
        attempt: finish({
          protectionState: 'Unprotected',
          backupRef,
          outcome: 'Failed',
          failureStage: 'destroy',
          failureReason: errorMessage(error),
          detail: `Delete rejected: ${errorMessage(error)}`,
        }),
      };
    }

    return {
      attempt: finish({
        protectionState: 'Unprotected',
        backupRef,
        outcome: 'Succeeded',
        detail: `Deleted ${record.kind} ${record.id}`,
      }),
    };
  }
}
