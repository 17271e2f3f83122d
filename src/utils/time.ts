/**
 * Video Trimmer - Time Utilities
 * Conversion functions for time units with microsecond precision.
 *
 * Times are whole microseconds. Integer sums and comparisons are exact, so
 * repeated range edits never accumulate floating point error.
 */

import { TIME } from '../constants';

/**
 * Convert seconds to microseconds
 */
export function secondsToUs(seconds: number): number {
  return Math.round(seconds * TIME.US_PER_SECOND);
}

/**
 * Convert microseconds to seconds
 */
export function usToSeconds(us: number): number {
  return us / TIME.US_PER_SECOND;
}

/**
 * Convert milliseconds to microseconds
 */
export function msToUs(ms: number): number {
  return Math.round(ms * TIME.US_PER_MS);
}

/**
 * Format microseconds as timecode string (M:SS.mmm, or H:MM:SS.mmm past an hour)
 */
export function formatTimecode(us: number): string {
  const sign = us < 0 ? '-' : '';
  const totalMs = Math.floor(Math.abs(us) / TIME.US_PER_MS);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const milliseconds = totalMs % 1000;

  const ss = seconds.toString().padStart(2, '0');
  const mmm = milliseconds.toString().padStart(3, '0');

  if (hours > 0) {
    return `${sign}${hours}:${minutes.toString().padStart(2, '0')}:${ss}.${mmm}`;
  }
  return `${sign}${minutes}:${ss}.${mmm}`;
}

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
