/**
 * Engine Types
 * Type definitions for the trimmer engine.
 */

import type {
  FeedbackSink,
  ThumbnailGenerator,
  TimerScheduler,
  TrimmerConfig,
  ViewportSize,
} from '../core/types';

/**
 * Trimmer construction options
 */
export interface VideoTrimmerOptions<TImage> {
  /** Thumbnail source; without one the strip stays empty */
  thumbnailGenerator?: ThumbnailGenerator<TImage>;
  /** Haptic or audible feedback output */
  feedback?: FeedbackSink;
  /** Timer source for the zoom dwell and tile retirement (defaults to setTimeout) */
  scheduler?: TimerScheduler;
  /** Overrides for the default configuration */
  config?: Partial<TrimmerConfig>;
  /** Initial control size */
  viewport?: ViewportSize;
}

/**
 * Callback for any state change
 */
export type TrimmerStateListener = () => void;
