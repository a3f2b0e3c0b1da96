export { BaseDeletionHandler, DEFAULT_BACKUP_WAIT, waitForBackup } from './base';
export type { BackupWaitOptions, DeletionHandler, HandlerContext, PollStatus } from './base';
export { getHandler } from './factory';
export type { HandlerFactory } from './factory';
