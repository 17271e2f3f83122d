/**
 * Video Trimmer - Configuration Type Definitions
 */

/** Resolved trimmer configuration */
export interface TrimmerConfig {
  /** Distance between the control's sides and the trim handles (pixels) */
  horizontalInset: number;
  /** Width of each handle's chevron (pixels) */
  chevronWidth: number;
  /** Height of the handle edges above and below the thumbnails (pixels) */
  edgeHeight: number;
  /** Device pixels per layout pixel, used for snapping and thumbnail oversampling */
  devicePixelRatio: number;
  /** Pause while dragging an edge before zooming in (ms) */
  zoomDwellMs: number;
  /** Longest zoomed window (microseconds) */
  maxZoomDurationUs: number;
  /** Zoomed window as a fraction of the asset duration, when shorter than the maximum */
  zoomAssetFraction: number;
  /** Extra thumbnails before the visible start */
  tilePaddingBefore: number;
  /** Extra thumbnails after the visible end */
  tilePaddingAfter: number;
  /** Delay before a retired thumbnail generation fades out (ms) */
  tileFadeDelayMs: number;
  /** Fade-out duration of a retired thumbnail generation (ms) */
  tileFadeDurationMs: number;
}
