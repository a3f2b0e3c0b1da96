export { AuditTrail, DeletedResourcesSink, JsonLinesAuditSink, TextAuditSink, formatAuditLine } from './audit';
export type { AuditSink } from './audit';
export { JsonLinesBackupManifest, MemoryBackupManifest } from './backupManifest';
export type { BackupManifest, BackupManifestEntry } from './backupManifest';
export { DeletionExecutor } from './executor';
export type { ExecutionResult, ExecutorDependencies } from './executor';
export { checkAge, checkState, checkTags } from './gates';
export type { GateResult } from './gates';
export { ReadlinePrompt, parseConfirmation } from './prompt';
export type {
  ConfirmationAnswer,
  ConfirmationPrompt,
  ConfirmationRequest,
  OperatorPrompt,
} from './prompt';
export { createSessionId } from './session';
export { openSessionLog, SESSION_FILES } from './sessionLog';
export type { SessionLog } from './sessionLog';
export { formatExecutionSummary, summarizeAttempts } from './summary';
