/**
 * Snapshot of a local log file taken at scan time
 */
export interface LogFile {
  readonly path: string;
  readonly filename: string;
  readonly sizeBytes: number;
  /** Canonical YYYY-MM-DD date embedded in the filename, if any */
  readonly embeddedDate: string | null;
}
