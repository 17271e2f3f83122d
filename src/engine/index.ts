/**
 * Engine Module
 * Barrel export for all engine components.
 */

// Main trimmer class
export { VideoTrimmer } from './VideoTrimmer';

// Types
export type { VideoTrimmerOptions, TrimmerStateListener } from './types';

// Components (for advanced usage)
export { InteractionStateMachine, type InteractionHost } from './InteractionStateMachine';
export { ZoomEngine, computeZoomedRange, type ZoomContext, type ZoomEngineOptions } from './ZoomEngine';
export {
  ThumbnailScheduler,
  computeTileLayout,
  applyVideoTransform,
  type ThumbnailSchedulerOptions,
  type TileLayout,
  type TileLayoutInput,
} from './ThumbnailScheduler';
export { EngineEventEmitter } from './EngineEvents';
export { DEFAULT_TRIMMER_CONFIG, resolveConfig } from './config';
export { systemTimerScheduler, silentFeedbackSink } from './TimerScheduler';
