/**
 * Video Trimmer - Centralized Constants
 * All configuration defaults in one place for easy maintenance.
 */

/** Time conversion constants */
export const TIME = {
  /** Microseconds per second */
  US_PER_SECOND: 1_000_000,
  /** Microseconds per millisecond */
  US_PER_MS: 1_000,
} as const;

/** Trim control geometry and interaction defaults */
export const TRIMMER = {
  /** Distance between the control's sides and the trim handles, in pixels */
  HORIZONTAL_INSET: 16,
  /** Width of the grabbable chevron on each handle, in pixels */
  CHEVRON_WIDTH: 16,
  /** Height of the top and bottom handle edges framing the thumbnails */
  EDGE_HEIGHT: 4,
  /** Device pixels per layout pixel */
  DEVICE_PIXEL_RATIO: 1,
} as const;

/** Dwell-to-zoom defaults */
export const ZOOM = {
  /** Pause while dragging an edge before zooming in (ms) */
  DWELL_MS: 500,
  /** Longest zoomed window (2 seconds) */
  MAX_DURATION_US: 2_000_000,
  /** Zoomed window as a fraction of the asset when the asset is short */
  ASSET_FRACTION: 0.5,
} as const;

/** Thumbnail strip defaults */
export const THUMBNAILS = {
  /** Extra tiles generated before the visible start */
  PADDING_BEFORE: 3,
  /** Extra tiles generated after the visible end */
  PADDING_AFTER: 6,
  /** Delay before a retired generation starts fading out (ms) */
  FADE_DELAY_MS: 250,
  /** Fade-out duration of a retired generation (ms) */
  FADE_DURATION_MS: 250,
} as const;
