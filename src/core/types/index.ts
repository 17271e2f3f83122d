/**
 * Video Trimmer - Core Type Definitions
 * Re-exports all types from domain-specific modules.
 */

// Timeline types
export type {
  TimeRange,
  TrimmingState,
  InteractionState,
  ZoomState,
  ProgressIndicatorMode,
  ViewportSize,
  PixelFrame,
} from './timeline';

// Input types
export type { InteractiveElement, PointerEventKind, PointerInput, DragSession } from './input';

// Collaborator contracts
export type {
  AffineTransform,
  AssetMetadata,
  ThumbnailRequest,
  ThumbnailBatch,
  ThumbnailOutcome,
  ThumbnailResult,
  ThumbnailGenerator,
  FeedbackKind,
  FeedbackSink,
  ScheduledTask,
  TimerScheduler,
} from './collaborators';

// Thumbnail types
export type { ThumbnailTile, TilePhase, TileTransition, TilePlacement } from './thumbnail';

// Configuration types
export type { TrimmerConfig } from './config';

// Event types
export type {
  TrimmerSnapshot,
  TrimmerEventType,
  TrimmerEvent,
  TrimmerEventCallback,
} from './events';
