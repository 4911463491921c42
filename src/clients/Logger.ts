import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { FileOutcome, RunSummary } from '../interfaces/ArchiveEngine';

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'credential',
  'accesskey',
  'access_key',
];

function toMegabytes(bytes: number): number {
  return Math.round((bytes / 1024 / 1024) * 100) / 100;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));
}

/**
 * Copy of the metadata with sensitive values replaced, nested objects included
 */
export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

// Runs at the logger level, so every transport format sees the redacted entry
const redact = winston.format(info => {
  for (const [key, value] of Object.entries(info)) {
    if (isSensitiveKey(key)) {
      info[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      info[key] = sanitizeMeta(value);
    }
  }
  return info;
});

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO, logFile?: string) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        redact(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
        winston.format.printf((info) => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: Record<string, unknown> = {
            timestamp,
            level,
            message
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = meta;
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        }),
        // The file keeps the JSON lines produced by the logger-level format
        ...(logFile ? [new winston.transports.File({ filename: logFile })] : [])
      ]
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errno: NodeJS.ErrnoException | undefined = error;
    const errorMeta = {
      ...meta,
      ...(errno && {
        error: {
          name: errno.name,
          message: errno.message,
          stack: errno.stack,
          // Filesystem errors carry these
          ...(errno.code ? { code: errno.code } : {}),
          ...(errno.syscall ? { syscall: errno.syscall } : {}),
          ...(errno.path ? { path: errno.path } : {})
        }
      })
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logRunStart(runId: string, cutoffDate: string, meta?: LogMeta): void {
    this.info('Archive run started', {
      operation: 'run_start',
      runId,
      cutoffDate,
      ...meta
    });
  }

  logFileArchived(filename: string, sizeBytes: number, key: string): void {
    this.info('File archived and removed locally', {
      operation: 'file_archived',
      filename,
      sizeBytes,
      sizeMB: toMegabytes(sizeBytes),
      remoteKey: key
    });
  }

  logFileFailed(outcome: Extract<FileOutcome, { status: 'failed' }>): void {
    this.warn(`File left in place after ${outcome.stage} failure`, {
      operation: 'file_failed',
      filename: outcome.file.filename,
      stage: outcome.stage,
      reason: outcome.reason,
      detail: outcome.detail,
      remoteKey: outcome.key
    });
  }

  logDeletionFailure(outcome: Extract<FileOutcome, { status: 'delete-failed' }>, error: Error): void {
    this.error('Verified remote copy exists but local file could not be deleted; reconcile manually', error, {
      operation: 'delete_failed',
      filename: outcome.file.filename,
      localPath: outcome.file.path,
      remoteKey: outcome.key
    });
  }

  logRunSummary(runId: string, summary: RunSummary, durationMs: number): void {
    const meta = {
      operation: 'run_summary',
      runId,
      ...summary,
      archivedMB: toMegabytes(summary.archivedBytes),
      durationMs
    };

    if (summary.failedCount > 0) {
      this.warn('Archive run completed with failures', meta);
    } else {
      this.info('Archive run completed', meta);
    }
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config)
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled archive execution triggered', {
      operation: 'scheduled_execution',
      cronExpression
    });
  }

  /**
   * Create a logger instance with the specified log level from environment
   */
  static createFromEnvironment(env: NodeJS.ProcessEnv = process.env): Logger {
    const requested = env.LOG_LEVEL?.toLowerCase();
    const logLevel = Object.values(LogLevel).find(level => level === requested);

    if (requested && !logLevel) {
      console.warn(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Using INFO level.`);
    }

    return new Logger(logLevel ?? LogLevel.INFO, env.ARCHIVER_LOG_FILE || undefined);
  }
}
