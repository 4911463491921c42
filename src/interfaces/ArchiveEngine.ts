import { LogFile } from '../types/LogFile';

export type FailureStage = 'upload' | 'verify';

export type SkipReason = 'unparseable';

export type FailureReason =
  | 'transfer-failed'
  | 'remote-object-missing'
  | 'remote-stat-failed'
  | 'local-stat-failed'
  | 'size-mismatch';

/**
 * Terminal state of one file within a run
 */
export type FileOutcome =
  | { status: 'kept'; file: LogFile }
  | { status: 'skipped'; file: LogFile; reason: SkipReason }
  | { status: 'archived'; file: LogFile; key: string; verifiedBytes: number }
  | { status: 'failed'; file: LogFile; key: string; stage: FailureStage; reason: FailureReason; detail: string }
  | { status: 'delete-failed'; file: LogFile; key: string; detail: string };

/**
 * Aggregated counts for one run
 */
export interface RunSummary {
  archivedCount: number;
  archivedBytes: number;
  /** Includes deletion failures */
  failedCount: number;
  keptCount: number;
  skippedCount: number;
  deleteFailedCount: number;
}

/**
 * Result of one archival pass
 */
export interface RunResult {
  runId: string;

  /** Canonical YYYY-MM-DD cutoff used for the run */
  cutoffDate: string;

  summary: RunSummary;

  /** One outcome per enumerated file, in filename order */
  outcomes: FileOutcome[];

  /** True iff no file failed */
  success: boolean;

  durationMs: number;
}

/**
 * Interface for the archive orchestration engine
 */
export interface ArchiveEngine {
  /** Execute one archival pass */
  executeArchive(now?: Date): Promise<RunResult>;

  /** Enumerate the candidate local files */
  scan(): Promise<LogFile[]>;

  /** Validate the log directory and remote connectivity without throwing */
  validateConfiguration(): Promise<boolean>;
}
