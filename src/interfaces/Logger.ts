import { FileOutcome, RunSummary } from './ArchiveEngine';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for archive runs
  logRunStart(runId: string, cutoffDate: string, meta?: LogMeta): void;
  logFileArchived(filename: string, sizeBytes: number, key: string): void;
  logFileFailed(outcome: Extract<FileOutcome, { status: 'failed' }>): void;
  logDeletionFailure(outcome: Extract<FileOutcome, { status: 'delete-failed' }>, error: Error): void;
  logRunSummary(runId: string, summary: RunSummary, durationMs: number): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
