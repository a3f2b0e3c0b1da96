/**
 * Files of one deletion session, under `<logDir>/<sessionId>/`.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ExecutionSummary } from '@shared/types';
import { AuditTrail, DeletedResourcesSink, JsonLinesAuditSink, TextAuditSink } from './audit';
import { JsonLinesBackupManifest } from './backupManifest';

export const SESSION_FILES = {
  jsonLog: 'audit.jsonl',
  textLog: 'session.log',
  deletedResources: 'deleted_resources.csv',
  backupManifest: 'backup_manifest.jsonl',
  summary: 'session_summary.json',
} as const;

export interface SessionLog {
  directory: string;
  auditTrail: AuditTrail;
  backupManifest: JsonLinesBackupManifest;
  writeSummary(summary: ExecutionSummary): Promise<string>;
}

export async function openSessionLog(logDir: string, sessionId: string): Promise<SessionLog> {
  const directory = path.join(logDir, sessionId);
  await mkdir(directory, { recursive: true });

  const auditTrail = new AuditTrail([
    new JsonLinesAuditSink(path.join(directory, SESSION_FILES.jsonLog)),
    new TextAuditSink(path.join(directory, SESSION_FILES.textLog)),
    new DeletedResourcesSink(path.join(directory, SESSION_FILES.deletedResources)),
  ]);

  return {
    directory,
    auditTrail,
    backupManifest: new JsonLinesBackupManifest(path.join(directory, SESSION_FILES.backupManifest)),
    async writeSummary(summary: ExecutionSummary): Promise<string> {
      await auditTrail.flush();
      const file = path.join(directory, SESSION_FILES.summary);
      await writeFile(
        file,
        `${JSON.stringify({ ...summary, completedAt: new Date().toISOString() }, null, 2)}\n`,
        'utf8'
      );
      return file;
    },
  };
}
