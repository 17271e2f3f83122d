/**
 * Video Trimmer - Timeline Type Definitions
 * Types for time ranges, trimming and zoom state.
 */

/** A span of time; all values are whole microseconds */
export interface TimeRange {
  /** Start time (microseconds) */
  startUs: number;
  /** Duration (microseconds, never negative) */
  durationUs: number;
}

/** Which edge, if any, the user is dragging */
export type TrimmingState = 'none' | 'leading' | 'trailing';

/** Interaction state machine states */
export type InteractionState = 'idle' | 'draggingLeading' | 'draggingTrailing' | 'scrubbing';

/** Zoom state owned by the zoom engine */
export interface ZoomState {
  active: boolean;
  /** Window shown while zoomed in (meaningful only while active) */
  zoomedRange: TimeRange;
}

/** Whether the progress indicator is shown and can be dragged */
export type ProgressIndicatorMode = 'hiddenOnlyWhenTrimming' | 'alwaysShown' | 'alwaysHidden';

/** Pixel size of the control */
export interface ViewportSize {
  width: number;
  height: number;
}

/** Pixel rectangle relative to the control's origin */
export interface PixelFrame {
  x: number;
  y: number;
  width: number;
  height: number;
}
