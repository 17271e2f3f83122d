/**
 * Video Trimmer
 * Main orchestrator: owns the model, the interaction state machine, the
 * zoom engine and the thumbnail scheduler, and exposes read-only state,
 * mutators, gesture events and tile placements.
 *
 * All mutation happens on the caller's event loop. Pointer events, dwell
 * timer callbacks and thumbnail results are handled one at a time in
 * arrival order.
 */

import { CoordinateMapper } from '../core/CoordinateMapper';
import { TimeRangeModel } from '../core/TimeRangeModel';
import { TrimmerError } from '../core/errors';
import { rangeEnd } from '../core/TimeRange';
import type {
  AssetMetadata,
  InteractionState,
  InteractiveElement,
  PointerInput,
  ProgressIndicatorMode,
  TilePlacement,
  TimeRange,
  TrimmerConfig,
  TrimmerEvent,
  TrimmerEventCallback,
  TrimmerEventType,
  TrimmerSnapshot,
  TrimmingState,
  ViewportSize,
} from '../core/types';
import { createLogger } from '../utils/logger';
import { resolveConfig } from './config';
import { EngineEventEmitter } from './EngineEvents';
import { InteractionStateMachine } from './InteractionStateMachine';
import { ThumbnailScheduler } from './ThumbnailScheduler';
import { silentFeedbackSink, systemTimerScheduler } from './TimerScheduler';
import type { TrimmerStateListener, VideoTrimmerOptions } from './types';
import { ZoomEngine } from './ZoomEngine';

const logger = createLogger('VideoTrimmer');

// Re-export types for external use
export type { VideoTrimmerOptions, TrimmerStateListener } from './types';

export class VideoTrimmer<TImage = unknown> {
  readonly config: TrimmerConfig;

  private model = new TimeRangeModel();
  private zoom: ZoomEngine;
  private machine: InteractionStateMachine;
  private thumbnails: ThumbnailScheduler<TImage> | null;

  private events = new EngineEventEmitter<TrimmerEvent>();
  private stateListeners = new EngineEventEmitter<void>();

  private _viewport: ViewportSize;
  private _progressIndicatorMode: ProgressIndicatorMode = 'hiddenOnlyWhenTrimming';
  private animateProgress = false;
  private disposed = false;
  // set while attachAsset tears down the previous asset
  private attaching = false;

  private cachedSnapshot: TrimmerSnapshot | null = null;
  private cachedPlacements: TilePlacement<TImage>[] | null = null;

  constructor(options: VideoTrimmerOptions<TImage> = {}) {
    this.config = resolveConfig(options.config);
    this._viewport = options.viewport ?? { width: 0, height: 0 };

    const scheduler = options.scheduler ?? systemTimerScheduler;
    const feedback = options.feedback ?? silentFeedbackSink;

    this.zoom = new ZoomEngine({
      scheduler,
      feedback,
      config: this.config,
      getContext: () => ({
        trimmingState: this.machine.trimmingState,
        selectedRange: this.model.selectedRange,
        assetRange: this.model.assetRange,
        mapper: this.createMapper(this.model.assetRange),
      }),
    });

    this.machine = new InteractionStateMachine({
      model: this.model,
      zoom: this.zoom,
      feedback,
      mapper: () => this.coordinateMapper,
      canScrub: () => this.isProgressIndicatorVisible,
      emit: (type) => this.emit(type),
    });

    this.thumbnails = options.thumbnailGenerator
      ? new ThumbnailScheduler<TImage>({
          generator: options.thumbnailGenerator,
          scheduler,
          config: this.config,
          onChange: () => this.changed(),
        })
      : null;

    this.model.subscribe(() => this.changed());
    this.zoom.subscribe(() => {
      this.refreshThumbnails();
      this.changed();
    });
  }

  // ============================================================================
  // READ-ONLY STATE
  // ============================================================================

  get trimmingState(): TrimmingState {
    return this.machine.trimmingState;
  }

  get interactionState(): InteractionState {
    return this.machine.state;
  }

  get isScrubbing(): boolean {
    return this.machine.isScrubbing;
  }

  get isZoomedIn(): boolean {
    return this.zoom.isZoomedIn;
  }

  get zoomedRange(): TimeRange {
    return this.zoom.zoomedRange;
  }

  /** Window mapped onto the viewport: the zoomed window or the whole asset */
  get visibleRange(): TimeRange {
    return this.zoom.isZoomedIn ? this.zoom.zoomedRange : this.model.assetRange;
  }

  get assetRange(): TimeRange {
    return this.model.assetRange;
  }

  get selectedRange(): TimeRange {
    return this.model.selectedRange;
  }

  /** Edge under drag: selection start when leading, end when trailing, 0 otherwise */
  get selectedTimeUs(): number {
    switch (this.machine.trimmingState) {
      case 'leading':
        return this.model.selectedRange.startUs;
      case 'trailing':
        return rangeEnd(this.model.selectedRange);
      case 'none':
        return 0;
    }
  }

  get progressUs(): number {
    return this.model.progressUs;
  }

  get minimumDurationUs(): number {
    return this.model.minimumDurationUs;
  }

  get viewport(): ViewportSize {
    return this._viewport;
  }

  get progressIndicatorMode(): ProgressIndicatorMode {
    return this._progressIndicatorMode;
  }

  get isProgressIndicatorVisible(): boolean {
    switch (this._progressIndicatorMode) {
      case 'alwaysShown':
        return true;
      case 'alwaysHidden':
        return false;
      case 'hiddenOnlyWhenTrimming':
        return this.machine.trimmingState === 'none';
    }
  }

  /** Mapper for the visible window */
  get coordinateMapper(): CoordinateMapper {
    return this.createMapper(this.visibleRange);
  }

  // ============================================================================
  // MUTATORS
  // ============================================================================

  /**
   * Attach an asset: any drag in progress is cancelled, zoom is cleared and
   * the whole asset becomes selected.
   */
  attachAsset(asset: AssetMetadata): void {
    this.assertNotDisposed();

    this.attaching = true;
    try {
      this.machine.cancelActive();
      this.zoom.reset();
      this.model.attachAsset(asset.durationUs);
      this.animateProgress = false;
      this.thumbnails?.setAsset(asset);
    } finally {
      this.attaching = false;
    }
    this.refreshThumbnails();

    logger.info('Asset attached', {
      durationUs: this.model.assetRange.durationUs,
      width: asset.naturalSize.width,
      height: asset.naturalSize.height,
    });
  }

  setMinimumDuration(durationUs: number): void {
    this.assertNotDisposed();
    this.model.setMinimumDuration(durationUs);
  }

  /**
   * Set the selection programmatically. Out-of-range input is normalized.
   * @returns The range actually stored
   */
  setSelectedRange(range: TimeRange): TimeRange {
    this.assertNotDisposed();
    return this.model.setSelectedRange(range);
  }

  setProgress(timeUs: number, animated = false): void {
    this.assertNotDisposed();
    if (!Number.isFinite(timeUs)) {
      logger.debug('Ignoring non-finite progress', { timeUs });
      return;
    }
    if (Math.round(timeUs) === this.model.progressUs) return;
    this.animateProgress = animated;
    this.model.setProgress(timeUs);
  }

  setProgressIndicatorMode(mode: ProgressIndicatorMode): void {
    this.assertNotDisposed();
    if (mode === this._progressIndicatorMode) return;
    this._progressIndicatorMode = mode;
    this.changed();
  }

  setViewport(viewport: ViewportSize): void {
    this.assertNotDisposed();
    if (viewport.width === this._viewport.width && viewport.height === this._viewport.height) return;
    this._viewport = { width: viewport.width, height: viewport.height };
    this.refreshThumbnails();
    this.changed();
  }

  // ============================================================================
  // INPUT
  // ============================================================================

  /**
   * Feed a normalized pointer event for one of the interactive elements.
   * @returns false when the event was ignored
   */
  handlePointer(element: InteractiveElement, input: PointerInput): boolean {
    if (this.disposed) return false;
    return this.machine.handle(element, input);
  }

  // ============================================================================
  // OUTPUT
  // ============================================================================

  /**
   * Subscribe to gesture events.
   * @returns Unsubscribe function
   */
  on(callback: TrimmerEventCallback): () => void {
    return this.events.on(callback);
  }

  /**
   * Subscribe to any state change, including tile updates.
   * @returns Unsubscribe function
   */
  subscribe(listener: TrimmerStateListener): () => void {
    return this.stateListeners.on(listener);
  }

  /**
   * Current state; the same object is returned until something changes.
   */
  getSnapshot(): TrimmerSnapshot {
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = Object.freeze({
        trimmingState: this.trimmingState,
        isScrubbing: this.isScrubbing,
        isZoomedIn: this.isZoomedIn,
        zoomedRange: this.zoomedRange,
        visibleRange: this.visibleRange,
        assetRange: this.assetRange,
        selectedRange: this.selectedRange,
        selectedTimeUs: this.selectedTimeUs,
        progressUs: this.progressUs,
        minimumDurationUs: this.minimumDurationUs,
        progressIndicatorMode: this._progressIndicatorMode,
        isProgressIndicatorVisible: this.isProgressIndicatorVisible,
        animateProgress: this.animateProgress,
      });
    }
    return this.cachedSnapshot;
  }

  /**
   * Thumbnail placements for the current window; cached until something changes.
   */
  layoutTiles(): TilePlacement<TImage>[] {
    if (!this.cachedPlacements) {
      this.cachedPlacements = this.thumbnails?.layout(this.coordinateMapper) ?? [];
    }
    return this.cachedPlacements;
  }

  /**
   * Resolves once every requested thumbnail batch has been consumed.
   */
  whenThumbnailsIdle(): Promise<void> {
    return this.thumbnails?.whenIdle() ?? Promise.resolve();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.zoom.dispose();
    this.thumbnails?.dispose();
    this.events.clear();
    this.stateListeners.clear();
    logger.debug('Disposed');
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private createMapper(visibleRange: TimeRange): CoordinateMapper {
    return new CoordinateMapper({
      visibleRange,
      viewportWidth: this._viewport.width,
      inset: this.config.horizontalInset + this.config.chevronWidth,
      pixelScale: this.config.devicePixelRatio,
    });
  }

  private refreshThumbnails(): void {
    if (this.attaching || !this.model.hasAsset) return;
    this.thumbnails?.update(this.visibleRange, this._viewport);
  }

  private emit(type: TrimmerEventType): void {
    // gesture-driven progress is never animated
    if (type === 'progressChanged') this.animateProgress = false;
    this.changed();
    this.events.emit({ type, snapshot: this.getSnapshot() });
  }

  private changed(): void {
    this.cachedSnapshot = null;
    this.cachedPlacements = null;
    this.stateListeners.emit(undefined);
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new TrimmerError('DISPOSED', 'VideoTrimmer has been disposed');
    }
  }
}
