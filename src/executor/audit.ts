/**
 * Append-only audit trail of deletion attempts.
 *
 * Attempts are frozen on append. Writes to the sinks go through one promise
 * chain, so entries reach every sink whole and in append order.
 */

import { access, appendFile } from 'node:fs/promises';
import { formatCsvRow } from '@/report/csv';
import type { DeletionAttempt } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cloud-sweep:audit');

export interface AuditSink {
  write(attempt: DeletionAttempt): Promise<void>;
}

export class AuditTrail {
  private entries: DeletionAttempt[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(private sinks: readonly AuditSink[] = []) {}

  /**
   * Record an attempt and write it to every sink.
   *
   * The attempt is kept in memory even when a sink fails; the returned promise
   * rejects with the sink error.
   */
  append(attempt: DeletionAttempt): Promise<void> {
    const entry = Object.freeze({ ...attempt });
    this.entries.push(entry);

    const write = this.tail.then(async () => {
      for (const sink of this.sinks) {
        await sink.write(entry);
      }
    });
    this.tail = write.catch((error: unknown) => {
      logger.error({ error, sequence: entry.sequence }, 'Audit write failed');
    });
    return write;
  }

  attempts(): readonly DeletionAttempt[] {
    return [...this.entries];
  }

  /**
   * Resolves once every pending write has settled.
   */
  flush(): Promise<void> {
    return this.tail;
  }
}

/**
 * Plain-object form of an attempt for machine-readable logs.
 */
export function serializeAttempt(attempt: DeletionAttempt): Record<string, unknown> {
  const { record, ...rest } = attempt;
  return {
    ...rest,
    resource: {
      ...record,
      createdAt: record.createdAt?.toISOString(),
    },
  };
}

/**
 * One JSON object per line.
 */
export class JsonLinesAuditSink implements AuditSink {
  constructor(private file: string) {}

  async write(attempt: DeletionAttempt): Promise<void> {
    await appendFile(this.file, `${JSON.stringify(serializeAttempt(attempt))}\n`, 'utf8');
  }
}

function textField(value: string | undefined): string {
  return (value ?? '-').replace(/[|\r\n]+/g, ' ');
}

/**
 * Pipe-delimited line for a human reader.
 *
 * @example "2026-10-19T10:00:01.000Z | 20261019-100000 | #1 | dry-run | Volume | us-east-1 | vol-1 | DryRunSimulated | Unprotected | - | Simulated delete"
 */
export function formatAuditLine(attempt: DeletionAttempt): string {
  return [
    attempt.finishedAt,
    attempt.sessionId,
    `#${attempt.sequence}`,
    attempt.mode,
    attempt.record.kind,
    attempt.record.region,
    textField(attempt.record.id),
    attempt.outcome,
    attempt.protectionState,
    textField(attempt.backupRef),
    textField(attempt.detail),
  ].join(' | ');
}

export class TextAuditSink implements AuditSink {
  constructor(private file: string) {}

  async write(attempt: DeletionAttempt): Promise<void> {
    await appendFile(this.file, `${formatAuditLine(attempt)}\n`, 'utf8');
  }
}

export const DELETED_RESOURCES_HEADER = [
  'DeletedAt',
  'SessionId',
  'Kind',
  'Region',
  'ResourceId',
  'Name',
  'BackupRef',
  'EstMonthlyCost',
];

/**
 * CSV of resources actually deleted. Other outcomes are not written.
 */
export class DeletedResourcesSink implements AuditSink {
  private headerChecked = false;

  constructor(private file: string) {}

  private async ensureHeader(): Promise<void> {
    if (this.headerChecked) return;
    try {
      await access(this.file);
    } catch {
      await appendFile(this.file, `${formatCsvRow(DELETED_RESOURCES_HEADER)}\n`, 'utf8');
    }
    this.headerChecked = true;
  }

  async write(attempt: DeletionAttempt): Promise<void> {
    if (attempt.outcome !== 'Succeeded') return;

    await this.ensureHeader();
    const row = formatCsvRow([
      attempt.finishedAt,
      attempt.sessionId,
      attempt.record.kind,
      attempt.record.region,
      attempt.record.id,
      attempt.record.label,
      attempt.backupRef ?? '',
      attempt.estimatedMonthlyCost === undefined ? 'unknown' : attempt.estimatedMonthlyCost.toFixed(2),
    ]);
    await appendFile(this.file, `${row}\n`, 'utf8');
  }
}
