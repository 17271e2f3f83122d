/**
 * Zoom Engine
 * Zooms the timeline into a short window around the dragged edge once the
 * user pauses while trimming.
 */

import type { CoordinateMapper } from '../core/CoordinateMapper';
import type {
  FeedbackSink,
  ScheduledTask,
  TimeRange,
  TimerScheduler,
  TrimmerConfig,
  TrimmingState,
  ZoomState,
} from '../core/types';
import { EMPTY_RANGE, createRange, rangeEnd } from '../core/TimeRange';
import { createLogger } from '../utils/logger';

const logger = createLogger('ZoomEngine');

/** State read when the dwell timer fires */
export interface ZoomContext {
  trimmingState: TrimmingState;
  selectedRange: TimeRange;
  assetRange: TimeRange;
  /** Mapper for the unzoomed timeline */
  mapper: CoordinateMapper;
}

export interface ZoomEngineOptions {
  scheduler: TimerScheduler;
  feedback: FeedbackSink;
  config: Pick<TrimmerConfig, 'zoomDwellMs' | 'maxZoomDurationUs' | 'zoomAssetFraction'>;
  getContext: () => ZoomContext;
}

/**
 * Window of the zoomed timeline. The dragged edge keeps its fractional
 * position in the viewport, so it stays under the pointer.
 * Returns null when there is nothing to zoom into.
 */
export function computeZoomedRange(
  context: ZoomContext,
  config: ZoomEngineOptions['config']
): TimeRange | null {
  if (context.trimmingState === 'none') return null;

  const durationUs = Math.round(
    Math.min(config.maxZoomDurationUs, context.assetRange.durationUs * config.zoomAssetFraction)
  );
  if (durationUs <= 0) return null;

  const { mapper } = context;
  const edgeUs = context.trimmingState === 'leading'
    ? context.selectedRange.startUs
    : rangeEnd(context.selectedRange);

  const available = mapper.availableWidth;
  const fraction = available > 0 ? (mapper.locationForTime(edgeUs) - mapper.inset) / available : 0;

  return createRange(edgeUs - Math.round(fraction * durationUs), durationUs);
}

export class ZoomEngine {
  private readonly options: ZoomEngineOptions;
  private dwellTask: ScheduledTask | null = null;
  private _state: ZoomState = { active: false, zoomedRange: EMPTY_RANGE };
  private listeners = new Set<(state: ZoomState) => void>();

  constructor(options: ZoomEngineOptions) {
    this.options = options;
  }

  get state(): ZoomState {
    return this._state;
  }

  get isZoomedIn(): boolean {
    return this._state.active;
  }

  get zoomedRange(): TimeRange {
    return this._state.zoomedRange;
  }

  /** True while a dwell timer is armed */
  get isDwellPending(): boolean {
    return this.dwellTask !== null;
  }

  /**
   * Subscribe to zoom state changes.
   * @returns Unsubscribe function
   */
  subscribe(listener: (state: ZoomState) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Called for every move of an edge drag: restarts the dwell timer unless
   * already zoomed in.
   */
  noteDragMove(): void {
    this.cancelDwell();
    if (this._state.active) return;

    this.dwellTask = this.options.scheduler.schedule(this.options.config.zoomDwellMs, () => {
      this.dwellTask = null;
      this.enterIfDragging();
    });
  }

  /**
   * Leave zoom and drop any pending dwell timer.
   */
  exit(): void {
    this.cancelDwell();
    if (!this._state.active) return;

    this._state = { active: false, zoomedRange: this._state.zoomedRange };
    logger.debug('Exited zoom');
    this.notify();
  }

  /**
   * Forget the zoomed window entirely (new asset).
   */
  reset(): void {
    this.exit();
    this._state = { active: false, zoomedRange: EMPTY_RANGE };
  }

  dispose(): void {
    this.cancelDwell();
    this.listeners.clear();
  }

  private enterIfDragging(): void {
    if (this._state.active) return;

    const context = this.options.getContext();
    const zoomedRange = computeZoomedRange(context, this.options.config);
    if (!zoomedRange) return;

    this._state = { active: true, zoomedRange };
    logger.debug('Entered zoom', {
      edge: context.trimmingState,
      startUs: zoomedRange.startUs,
      durationUs: zoomedRange.durationUs,
    });
    this.options.feedback.pulse('impact');
    this.notify();
  }

  private cancelDwell(): void {
    this.dwellTask?.cancel();
    this.dwellTask = null;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this._state);
    }
  }
}
