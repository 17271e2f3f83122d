/**
 * Thumbnail Scheduler
 * Computes the thumbnail tiles for the visible window, requests their images
 * in one batch and retires the previous batch with a fade.
 *
 * Every batch gets a new generation number. Results are matched against the
 * current generation on arrival; anything older is dropped, so superseded
 * batches never need an explicit cancel.
 */

import type { CoordinateMapper } from '../core/CoordinateMapper';
import type {
  AffineTransform,
  AssetMetadata,
  ScheduledTask,
  ThumbnailBatch,
  ThumbnailGenerator,
  ThumbnailResult,
  ThumbnailTile,
  TilePlacement,
  TimeRange,
  TimerScheduler,
  TrimmerConfig,
  ViewportSize,
} from '../core/types';
import { rangesEqual } from '../core/TimeRange';
import { createTileId } from '../utils/id';
import { createLogger } from '../utils/logger';

const logger = createLogger('ThumbnailScheduler');

type SchedulerConfig = Pick<
  TrimmerConfig,
  'edgeHeight' | 'devicePixelRatio' | 'tilePaddingBefore' | 'tilePaddingAfter' | 'tileFadeDelayMs' | 'tileFadeDurationMs'
>;

export interface ThumbnailSchedulerOptions<TImage> {
  generator: ThumbnailGenerator<TImage>;
  scheduler: TimerScheduler;
  config: SchedulerConfig;
  /** Called whenever placements would change */
  onChange?: () => void;
}

export interface TileLayoutInput {
  visibleRange: TimeRange;
  viewport: ViewportSize;
  /** Display size of the video (natural size after its transform) */
  displaySize: { width: number; height: number };
  edgeHeight: number;
  paddingBefore: number;
  paddingAfter: number;
}

export interface TileLayout {
  tileSize: { width: number; height: number };
  /** Tiles needed to cover the viewport, without padding */
  tileCount: number;
  /** Sample times in strip order, padding included, negatives dropped */
  timesUs: number[];
}

interface TileBatch<TImage> {
  generation: number;
  tileSize: { width: number; height: number };
  tiles: ThumbnailTile<TImage>[];
}

interface RetiringBatch<TImage> extends TileBatch<TImage> {
  removal: ScheduledTask;
}

interface GenerationKey {
  visibleRange: TimeRange;
  width: number;
  height: number;
}

/**
 * Size of a video frame once its orientation transform is applied.
 */
export function applyVideoTransform(
  size: { width: number; height: number },
  transform?: AffineTransform
): { width: number; height: number } {
  if (!transform) return { ...size };
  return {
    width: Math.abs(transform.a * size.width) + Math.abs(transform.c * size.height),
    height: Math.abs(transform.b * size.width) + Math.abs(transform.d * size.height),
  };
}

/**
 * Tile size and sample times for a visible window.
 * Returns null when the viewport or video has no area.
 */
export function computeTileLayout(input: TileLayoutInput): TileLayout | null {
  const { visibleRange, viewport, displaySize } = input;
  if (viewport.width <= 0 || viewport.height <= 0) return null;
  if (displaySize.width <= 0 || displaySize.height <= 0) return null;

  const height = viewport.height - input.edgeHeight * 2;
  if (height <= 0) return null;
  const width = (height / displaySize.height) * displaySize.width;

  const tileCount = Math.ceil(viewport.width / width);
  const tileDurationUs = visibleRange.durationUs / tileCount;

  const timesUs: number[] = [];
  for (let index = -input.paddingBefore; index < tileCount + input.paddingAfter; index++) {
    const timeUs = visibleRange.startUs + Math.round(tileDurationUs * index);
    if (timeUs < 0) continue;
    timesUs.push(timeUs);
  }

  return { tileSize: { width, height }, tileCount, timesUs };
}

export class ThumbnailScheduler<TImage> {
  private readonly options: ThumbnailSchedulerOptions<TImage>;

  private displaySize: { width: number; height: number } | null = null;
  private lastKey: GenerationKey | null = null;
  private _generation = 0;
  private current: TileBatch<TImage> | null = null;
  private retiring: RetiringBatch<TImage>[] = [];
  private pending = new Set<Promise<void>>();
  private _discardedResults = 0;

  constructor(options: ThumbnailSchedulerOptions<TImage>) {
    this.options = options;
  }

  /** Generation of the newest batch (0 before the first) */
  get generation(): number {
    return this._generation;
  }

  /** Tiles of the newest batch */
  get tiles(): readonly ThumbnailTile<TImage>[] {
    return this.current?.tiles ?? [];
  }

  get retiringCount(): number {
    return this.retiring.length;
  }

  /** Results ignored because a newer batch had started */
  get discardedResults(): number {
    return this._discardedResults;
  }

  /**
   * Use a new asset's video track for sizing; clears the strip.
   */
  setAsset(metadata: AssetMetadata | null): void {
    this.displaySize = metadata
      ? applyVideoTransform(metadata.naturalSize, metadata.preferredTransform)
      : null;
    this.invalidate();
  }

  /**
   * Start a new batch if the visible window or viewport size changed since
   * the last one.
   * @returns true when a batch was started
   */
  update(visibleRange: TimeRange, viewport: ViewportSize): boolean {
    if (!this.displaySize) return false;
    if (viewport.width <= 0 || viewport.height <= 0) return false;

    const last = this.lastKey;
    if (
      last &&
      last.width === viewport.width &&
      last.height === viewport.height &&
      rangesEqual(last.visibleRange, visibleRange)
    ) {
      return false;
    }

    const layout = computeTileLayout({
      visibleRange,
      viewport,
      displaySize: this.displaySize,
      edgeHeight: this.options.config.edgeHeight,
      paddingBefore: this.options.config.tilePaddingBefore,
      paddingAfter: this.options.config.tilePaddingAfter,
    });
    if (!layout) return false;

    this.lastKey = { visibleRange, width: viewport.width, height: viewport.height };
    this.retireCurrent();

    const generation = ++this._generation;
    const tiles: ThumbnailTile<TImage>[] = layout.timesUs.map((timeUs) => ({
      id: createTileId(),
      timeUs,
      generation,
      image: null,
      fadeIn: false,
    }));
    this.current = { generation, tileSize: layout.tileSize, tiles };

    const { devicePixelRatio } = this.options.config;
    const batch: ThumbnailBatch = {
      generation,
      requests: tiles.map((tile) => ({ tileId: tile.id, timeUs: tile.timeUs, generation })),
      maximumSize: {
        width: Math.ceil(layout.tileSize.width * devicePixelRatio),
        height: Math.ceil(layout.tileSize.height * devicePixelRatio),
      },
    };

    logger.debug('Requesting thumbnails', {
      generation,
      count: tiles.length,
      startUs: visibleRange.startUs,
      durationUs: visibleRange.durationUs,
    });

    const task = this.consume(batch);
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));

    this.options.onChange?.();
    return true;
  }

  /**
   * Placements for the renderer: retiring tiles underneath, newest on top.
   */
  layout(mapper: CoordinateMapper): TilePlacement<TImage>[] {
    const placements: TilePlacement<TImage>[] = [];
    for (const batch of this.retiring) {
      this.place(batch, mapper, 'retiring', placements);
    }
    if (this.current) {
      this.place(this.current, mapper, 'active', placements);
    }
    return placements;
  }

  /**
   * Forget the last window so the next update regenerates; the current
   * tiles start retiring.
   */
  invalidate(): void {
    this.lastKey = null;
    this.retireCurrent();
    this.options.onChange?.();
  }

  /**
   * Resolves once every in-flight batch has been consumed.
   */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  dispose(): void {
    for (const batch of this.retiring) {
      batch.removal.cancel();
    }
    this.retiring = [];
    this.current = null;
    this.lastKey = null;
    // results still in flight belong to an older generation from here on
    this._generation++;
  }

  private async consume(batch: ThumbnailBatch): Promise<void> {
    try {
      for await (const result of this.options.generator.generate(batch)) {
        this.applyResult(result);
      }
    } catch (err) {
      logger.warn('Thumbnail generation failed', {
        generation: batch.generation,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private applyResult(result: ThumbnailResult<TImage>): void {
    const { request, outcome } = result;
    const current = this.current;

    if (!current || request.generation !== current.generation || request.generation !== this._generation) {
      this._discardedResults++;
      return;
    }

    const index = current.tiles.findIndex((tile) => tile.id === request.tileId);
    const tile = current.tiles[index];
    if (!tile) return;

    if (outcome.status === 'failed') {
      logger.debug('Thumbnail unavailable', { timeUs: request.timeUs, reason: outcome.reason });
      return;
    }

    current.tiles[index] = { ...tile, image: outcome.image, fadeIn: true };
    this.options.onChange?.();
  }

  private retireCurrent(): void {
    const batch = this.current;
    if (!batch) return;
    this.current = null;
    if (batch.tiles.length === 0) return;

    const { tileFadeDelayMs, tileFadeDurationMs } = this.options.config;
    const removal = this.options.scheduler.schedule(tileFadeDelayMs + tileFadeDurationMs, () => {
      this.retiring = this.retiring.filter((entry) => entry.generation !== batch.generation);
      this.options.onChange?.();
    });
    this.retiring.push({ ...batch, removal });
  }

  private place(
    batch: TileBatch<TImage>,
    mapper: CoordinateMapper,
    phase: 'active' | 'retiring',
    out: TilePlacement<TImage>[]
  ): void {
    const y = this.options.config.edgeHeight;
    for (const tile of batch.tiles) {
      out.push({
        tileId: tile.id,
        generation: tile.generation,
        timeUs: tile.timeUs,
        frame: {
          x: mapper.locationForTime(tile.timeUs),
          y,
          width: batch.tileSize.width,
          height: batch.tileSize.height,
        },
        image: tile.image,
        phase,
        transition: phase === 'retiring' ? 'fadeOut' : tile.fadeIn ? 'crossfade' : 'none',
      });
    }
  }
}
