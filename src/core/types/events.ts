/**
 * Video Trimmer - Event Type Definitions
 */

import type { ProgressIndicatorMode, TimeRange, TrimmingState } from './timeline';

/** Immutable view of the trimmer state */
export interface TrimmerSnapshot {
  trimmingState: TrimmingState;
  isScrubbing: boolean;
  isZoomedIn: boolean;
  zoomedRange: TimeRange;
  visibleRange: TimeRange;
  assetRange: TimeRange;
  selectedRange: TimeRange;
  /** Edge under drag: selection start when leading, end when trailing, 0 otherwise */
  selectedTimeUs: number;
  progressUs: number;
  minimumDurationUs: number;
  progressIndicatorMode: ProgressIndicatorMode;
  isProgressIndicatorVisible: boolean;
  /** True when the last progress change asked to be animated */
  animateProgress: boolean;
}

/** Gesture-driven event types */
export type TrimmerEventType =
  | 'beginTrim'
  | 'rangeChanged'
  | 'endTrim'
  | 'beginScrub'
  | 'progressChanged'
  | 'endScrub';

export interface TrimmerEvent {
  type: TrimmerEventType;
  snapshot: TrimmerSnapshot;
}

export type TrimmerEventCallback = (event: TrimmerEvent) => void;
