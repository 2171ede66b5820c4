import { format } from 'date-fns';

/**
 * Date partition directory names: YYYY-MM-DD
 */
export const DATE_PARTITION_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Category and file-name segments: a single flat path component
 */
const PATH_SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Local calendar day, e.g. '2026-01-15'
 */
export function datePartition(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Second-resolution time of day for file names, e.g. '09-30-05'
 */
export function timeStamp(date: Date): string {
  return format(date, 'HH-mm-ss');
}

export function isPathSegment(value: string): boolean {
  return PATH_SEGMENT_PATTERN.test(value);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
