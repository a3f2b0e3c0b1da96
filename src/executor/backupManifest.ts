/**
 * Record of confirmed backups taken during a session.
 */

import { appendFile } from 'node:fs/promises';
import type { BackupResult, ResourceKind } from '@shared/types';

export interface BackupManifestEntry {
  sessionId: string;
  sequence: number;
  kind: ResourceKind;
  region: string;
  resourceId: string;
  backupRef: string;
  backupType: BackupResult['type'];
  configuration?: Record<string, unknown>;
  createdAt: string;
}

export interface BackupManifest {
  append(entry: BackupManifestEntry): Promise<void>;
}

/**
 * One JSON object per line; a line is only written for a confirmed backup.
 */
export class JsonLinesBackupManifest implements BackupManifest {
  constructor(private file: string) {}

  async append(entry: BackupManifestEntry): Promise<void> {
    await appendFile(this.file, `${JSON.stringify(entry)}\n`, 'utf8');
  }
}

export class MemoryBackupManifest implements BackupManifest {
  readonly entries: BackupManifestEntry[] = [];

  async append(entry: BackupManifestEntry): Promise<void> {
    this.entries.push(entry);
  }
}
