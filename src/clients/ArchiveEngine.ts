import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  ArchiveEngine as IArchiveEngine,
  FailureReason,
  FileOutcome,
  RunResult,
  RunSummary,
} from '../interfaces/ArchiveEngine';
import { ArchiverConfig } from '../interfaces/ArchiverConfig';
import { Logger } from '../interfaces/Logger';
import { RemoteStore } from '../interfaces/RemoteStore';
import { LogFile } from '../types/LogFile';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { RemoteObjectNotFoundError } from '../errors/RemoteStoreErrors';
import { classify, matchesPattern, remoteKeyFor } from './FileClassifier';
import { cutoffDate, isEligible } from './RetentionPolicy';

/**
 * Custom error classes for per-file archive failures
 */
export class ArchiveError extends Error {
  constructor(message: string, public readonly operation: string, public readonly cause?: Error) {
    super(message);
    this.name = 'ArchiveError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class UploadError extends ArchiveError {
  constructor(message: string, public readonly key: string, cause?: Error) {
    super(message, 'upload', cause);
    this.name = 'UploadError';
  }
}

export class VerificationError extends ArchiveError {
  constructor(
    message: string,
    public readonly key: string,
    public readonly reason: FailureReason,
    cause?: Error
  ) {
    super(message, 'verify', cause);
    this.name = 'VerificationError';
  }
}

export class DeletionError extends ArchiveError {
  constructor(message: string, public readonly path: string, public readonly key: string, cause?: Error) {
    super(message, 'delete', cause);
    this.name = 'DeletionError';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function emptySummary(): RunSummary {
  return {
    archivedCount: 0,
    archivedBytes: 0,
    failedCount: 0,
    keptCount: 0,
    skippedCount: 0,
    deleteFailedCount: 0,
  };
}

export function summarize(outcomes: FileOutcome[]): RunSummary {
  const summary = emptySummary();

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'archived':
        summary.archivedCount++;
        summary.archivedBytes += outcome.verifiedBytes;
        break;
      case 'failed':
        summary.failedCount++;
        break;
      case 'delete-failed':
        summary.failedCount++;
        summary.deleteFailedCount++;
        break;
      case 'kept':
        summary.keptCount++;
        break;
      case 'skipped':
        summary.skippedCount++;
        break;
    }
  }

  return summary;
}

/**
 * ArchiveEngine orchestrates one archival pass.
 * Each eligible file goes upload -> verify -> delete, strictly one file at a time;
 * the local copy is removed only after the remote size matches the local size.
 */
export class ArchiveEngine implements IArchiveEngine {
  private remoteStore: RemoteStore;
  private config: ArchiverConfig;
  private logger: Logger;

  constructor(remoteStore: RemoteStore, config: ArchiverConfig, logger: Logger) {
    this.remoteStore = remoteStore;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Execute one archival pass.
   * Configuration and pre-flight connectivity errors are thrown before any file is touched;
   * per-file errors become outcomes and never stop the run.
   */
  async executeArchive(now: Date = new Date()): Promise<RunResult> {
    const startTime = Date.now();
    const runId = this.generateRunId();

    await ConfigurationManager.assertLogDirectory(this.config);
    await this.remoteStore.testConnection();

    const cutoff = cutoffDate(now, this.config.retentionDays);
    this.logger.logRunStart(runId, cutoff, {
      logDirectory: this.config.logDirectory,
      filenamePattern: this.config.filenamePattern,
      retentionDays: this.config.retentionDays,
    });

    const files = await this.scan();
    if (files.length === 0) {
      this.logger.info('No files matching pattern found', { runId });
    } else {
      this.logger.info(`Found ${files.length} files to process`, { runId });
    }

    const outcomes: FileOutcome[] = [];
    for (const file of files) {
      outcomes.push(await this.processFile(file, cutoff));
    }

    const summary = summarize(outcomes);
    const durationMs = Date.now() - startTime;
    this.logger.logRunSummary(runId, summary, durationMs);

    return {
      runId,
      cutoffDate: cutoff,
      summary,
      outcomes,
      success: summary.failedCount === 0,
      durationMs,
    };
  }

  /**
   * Enumerate regular files (or symlinks to them) in the log directory matching the configured pattern, sorted by filename
   */
  async scan(): Promise<LogFile[]> {
    const entries = await fs.readdir(this.config.logDirectory, { withFileTypes: true });

    const names = entries
      .filter(entry => entry.isFile() || entry.isSymbolicLink())
      .filter(entry => matchesPattern(entry.name, this.config.filenamePattern))
      .map(entry => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const files: LogFile[] = [];
    for (const filename of names) {
      const path = join(this.config.logDirectory, filename);
      try {
        // Follows symlinks; a link to anything but a regular file is left alone
        const stats = await fs.stat(path);
        if (!stats.isFile()) {
          this.logger.debug(`Not a regular file, ignoring: ${filename}`);
          continue;
        }
        files.push(Object.freeze({
          path,
          filename,
          sizeBytes: stats.size,
          embeddedDate: classify(filename),
        }));
      } catch (error) {
        // Rotated away by the writer between listing and stat
        if (isMissingFile(error)) {
          this.logger.debug(`File disappeared before it could be examined: ${filename}`);
          continue;
        }
        throw error;
      }
    }

    return files;
  }

  /**
   * Validate the log directory and remote connectivity
   */
  async validateConfiguration(): Promise<boolean> {
    try {
      this.logger.info('Validating configuration...');
      await ConfigurationManager.assertLogDirectory(this.config);
      this.logger.info('Log directory check passed', { logDirectory: this.config.logDirectory });

      await this.remoteStore.testConnection();
      this.logger.info('Remote store connection test passed', { bucket: this.config.remoteBucket });
      return true;
    } catch (error) {
      this.logger.error('Configuration validation failed', toError(error));
      return false;
    }
  }

  private async processFile(file: LogFile, cutoff: string): Promise<FileOutcome> {
    if (file.embeddedDate === null) {
      this.logger.info(`SKIP: Cannot extract date from ${file.filename}`);
      return { status: 'skipped', file, reason: 'unparseable' };
    }

    if (!isEligible(file.embeddedDate, cutoff)) {
      this.logger.debug(`KEEP: ${file.filename}`, { embeddedDate: file.embeddedDate });
      return { status: 'kept', file };
    }

    const key = remoteKeyFor(this.config.remotePathPrefix, file.filename, file.embeddedDate);
    this.logger.info(`ARCHIVE: ${file.filename} -> ${key}`, {
      sizeBytes: file.sizeBytes,
      embeddedDate: file.embeddedDate,
    });

    try {
      await this.upload(file, key);
      const verifiedSize = await this.verify(file, key);
      await this.deleteLocal(file, key);

      this.logger.logFileArchived(file.filename, verifiedSize, key);
      return { status: 'archived', file, key, verifiedBytes: verifiedSize };
    } catch (error) {
      return this.toFailureOutcome(file, key, error);
    }
  }

  private async upload(file: LogFile, key: string): Promise<void> {
    try {
      await this.remoteStore.put(file.path, key);
    } catch (error) {
      const cause = toError(error);
      throw new UploadError(`Upload failed for ${file.filename}: ${cause.message}`, key, cause);
    }
  }

  /**
   * Compare the remote object's size with the local size read now, not at scan time.
   * Resolves with the verified size.
   */
  private async verify(file: LogFile, key: string): Promise<number> {
    let remoteSize: number;
    try {
      remoteSize = (await this.remoteStore.stat(key)).sizeBytes;
    } catch (error) {
      const cause = toError(error);
      const reason: FailureReason =
        error instanceof RemoteObjectNotFoundError ? 'remote-object-missing' : 'remote-stat-failed';
      throw new VerificationError(`Could not get remote file info for ${key}: ${cause.message}`, key, reason, cause);
    }

    let localSize: number;
    try {
      localSize = (await fs.stat(file.path)).size;
    } catch (error) {
      const cause = toError(error);
      throw new VerificationError(
        `Could not read local size of ${file.path}: ${cause.message}`,
        key,
        'local-stat-failed',
        cause
      );
    }

    if (localSize !== remoteSize) {
      throw new VerificationError(
        `Size mismatch: local=${localSize}, remote=${remoteSize}`,
        key,
        'size-mismatch'
      );
    }

    this.logger.debug(`Verified: sizes match (${localSize} bytes)`, { remoteKey: key });
    return localSize;
  }

  private async deleteLocal(file: LogFile, key: string): Promise<void> {
    try {
      await fs.unlink(file.path);
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Local file already gone after verification: ${file.path}`);
        return;
      }
      const cause = toError(error);
      throw new DeletionError(`Failed to delete ${file.path}: ${cause.message}`, file.path, key, cause);
    }
  }

  private toFailureOutcome(file: LogFile, key: string, error: unknown): FileOutcome {
    if (error instanceof DeletionError) {
      const outcome = { status: 'delete-failed' as const, file, key, detail: error.message };
      this.logger.logDeletionFailure(outcome, error);
      return outcome;
    }

    const outcome =
      error instanceof VerificationError
        ? { status: 'failed' as const, file, key, stage: 'verify' as const, reason: error.reason, detail: error.message }
        : {
            status: 'failed' as const,
            file,
            key,
            stage: 'upload' as const,
            reason: 'transfer-failed' as const,
            detail: toError(error).message,
          };

    this.logger.logFileFailed(outcome);
    return outcome;
  }

  /**
   * Generate unique run ID for tracking
   */
  private generateRunId(): string {
    return `archive-${uuidv4()}`;
  }
}
