/**
 * Video Trimmer - Time Range Helpers
 */

import type { TimeRange } from './types';

/** The empty range at zero */
export const EMPTY_RANGE: TimeRange = Object.freeze({ startUs: 0, durationUs: 0 });

export function createRange(startUs: number, durationUs: number): TimeRange {
  return { startUs, durationUs: Math.max(0, durationUs) };
}

/**
 * Build a range from its bounds; an end before the start yields an empty range
 */
export function rangeFromBounds(startUs: number, endUs: number): TimeRange {
  return createRange(startUs, endUs - startUs);
}

export function rangeEnd(range: TimeRange): number {
  return range.startUs + range.durationUs;
}

export function rangesEqual(a: TimeRange, b: TimeRange): boolean {
  return a.startUs === b.startUs && a.durationUs === b.durationUs;
}

/**
 * Check if a time lies within the range, bounds included
 */
export function rangeContains(range: TimeRange, timeUs: number): boolean {
  return timeUs >= range.startUs && timeUs <= rangeEnd(range);
}
