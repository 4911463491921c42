import { minimatch } from 'minimatch';

const EMBEDDED_DATE = /\d{4}-\d{2}-\d{2}/;

/**
 * Extract the first YYYY-MM-DD substring from a filename.
 * Returns null when the filename carries no date; callers treat that as unparseable, not as an error.
 */
export function classify(filename: string): string | null {
  const match = filename.match(EMBEDDED_DATE);
  return match ? match[0] : null;
}

/**
 * Check a bare filename against the configured selection glob
 */
export function matchesPattern(filename: string, pattern: string): boolean {
  return minimatch(filename, pattern);
}

/**
 * Strip leading and trailing slashes from a remote path prefix; '' means the bucket root
 */
export function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+/, '').replace(/\/+$/, '');
}

/**
 * Build the remote key {prefix}/{YYYY-MM}/{filename}.
 * Depends only on the embedded date and filename, so the same file always lands on the same key.
 */
export function remoteKeyFor(prefix: string, filename: string, embeddedDate: string): string {
  const yearMonth = embeddedDate.slice(0, 7);
  const normalizedPrefix = normalizePrefix(prefix);

  if (normalizedPrefix) {
    return `${normalizedPrefix}/${yearMonth}/${filename}`;
  }

  return `${yearMonth}/${filename}`;
}
