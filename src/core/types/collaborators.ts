/**
 * Video Trimmer - Collaborator Contracts
 * What the engine needs from the host: asset metadata, thumbnail images,
 * feedback output and a timer source.
 */

/** 2D affine transform `[a b 0; c d 0; tx ty 1]` applied to the video track */
export interface AffineTransform {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}

/** Metadata of the attached asset */
export interface AssetMetadata {
  /** Total duration (microseconds) */
  durationUs: number;
  /** Encoded frame size of the video track */
  naturalSize: { width: number; height: number };
  /** Orientation transform of the video track (identity when absent) */
  preferredTransform?: AffineTransform;
}

/** One thumbnail to generate */
export interface ThumbnailRequest {
  tileId: string;
  timeUs: number;
  generation: number;
}

/** A batch of thumbnails sharing one target pixel size */
export interface ThumbnailBatch {
  generation: number;
  requests: readonly ThumbnailRequest[];
  /** Largest image size wanted, in device pixels */
  maximumSize: { width: number; height: number };
}

export type ThumbnailOutcome<TImage> =
  | { status: 'ready'; image: TImage }
  | { status: 'failed'; reason: string };

/** Result for one request, yielded in any order */
export interface ThumbnailResult<TImage> {
  request: ThumbnailRequest;
  outcome: ThumbnailOutcome<TImage>;
}

/**
 * Produces thumbnail images off the coordination context.
 * May be called again before a previous batch finishes; superseded batches
 * can run to completion, their results are ignored.
 */
export interface ThumbnailGenerator<TImage> {
  generate(batch: ThumbnailBatch): AsyncIterable<ThumbnailResult<TImage>>;
}

/** Discrete feedback pulses: light selection ticks and heavy impacts */
export type FeedbackKind = 'selection' | 'impact';

export interface FeedbackSink {
  pulse(kind: FeedbackKind): void;
}

/** Handle to a scheduled single-shot task */
export interface ScheduledTask {
  cancel(): void;
}

/** Source of single-shot timers */
export interface TimerScheduler {
  schedule(delayMs: number, task: () => void): ScheduledTask;
}
