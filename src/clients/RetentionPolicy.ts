/**
 * Compute the cutoff date: the local calendar date of `now` minus `retentionDays` days.
 * Day granularity only; the time of day is discarded.
 */
export function cutoffDate(now: Date, retentionDays: number): string {
  if (!Number.isInteger(retentionDays) || retentionDays < 0) {
    throw new RangeError(`retentionDays must be a non-negative integer, got ${retentionDays}`);
  }

  const cutoff = new Date(now.getFullYear(), now.getMonth(), now.getDate() - retentionDays);
  return formatDate(cutoff);
}

/**
 * A file is eligible when its date is strictly before the cutoff.
 * Canonical zero-padded dates order the same as strings and as calendar days.
 */
export function isEligible(fileDate: string, cutoff: string): boolean {
  return fileDate < cutoff;
}

/**
 * Format date to YYYY-MM-DD using the local calendar
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');

  return `${year}-${month}-${day}`;
}
