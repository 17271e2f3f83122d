/**
 * Video Trimmer - Coordinate Mapper
 * Time/pixel conversion for the visible window of the timeline.
 */

import type { TimeRange } from './types';

export interface CoordinateMapperOptions {
  /** Time window mapped onto the viewport */
  visibleRange: TimeRange;
  /** Control width in pixels */
  viewportWidth: number;
  /** Pixels reserved on each side before the mapped area starts */
  inset: number;
  /** Device pixels per layout pixel (default 1) */
  pixelScale?: number;
}

/**
 * Round a layout value to the nearest device pixel boundary
 */
export function snapToDevicePixels(value: number, scale: number): number {
  return Math.round(value * scale) / scale;
}

export class CoordinateMapper {
  readonly visibleRange: TimeRange;
  readonly viewportWidth: number;
  readonly inset: number;
  readonly pixelScale: number;

  /** Pixels per microsecond; 0 when the mapping is degenerate */
  readonly ratio: number;

  constructor(options: CoordinateMapperOptions) {
    this.visibleRange = options.visibleRange;
    this.viewportWidth = options.viewportWidth;
    this.inset = options.inset;
    this.pixelScale = options.pixelScale && options.pixelScale > 0 ? options.pixelScale : 1;

    const available = this.availableWidth;
    this.ratio = this.visibleRange.durationUs > 0 && available > 0
      ? available / this.visibleRange.durationUs
      : 0;
  }

  /**
   * Width between the insets
   */
  get availableWidth(): number {
    return this.viewportWidth - this.inset * 2;
  }

  /**
   * True when times cannot be told apart (zero duration or no room)
   */
  get isDegenerate(): boolean {
    return this.ratio === 0;
  }

  /**
   * Time under a pixel offset, rounded to the microsecond.
   * Returns null for a degenerate mapping.
   */
  timeForLocation(x: number): number | null {
    if (this.ratio === 0) return null;
    return this.visibleRange.startUs + Math.round((x - this.inset) / this.ratio);
  }

  /**
   * Pixel offset of a time, snapped to device pixels.
   * Every time maps to the inset for a degenerate mapping.
   */
  locationForTime(timeUs: number): number {
    const location = (timeUs - this.visibleRange.startUs) * this.ratio;
    return snapToDevicePixels(location, this.pixelScale) + this.inset;
  }
}
