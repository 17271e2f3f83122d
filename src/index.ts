/**
 * Video Trimmer - Public API
 */

// Core models
export { TimeRangeModel, type ModelChange, type ModelListener } from './core/TimeRangeModel';
export { CoordinateMapper, snapToDevicePixels, type CoordinateMapperOptions } from './core/CoordinateMapper';
export {
  EMPTY_RANGE,
  createRange,
  rangeFromBounds,
  rangeEnd,
  rangesEqual,
  rangeContains,
} from './core/TimeRange';
export { TrimmerError, type TrimmerErrorCode } from './core/errors';

// Engine
export * from './engine';

// React binding
export * from './hooks';

// Types
export type * from './core/types';

// Utilities
export { secondsToUs, usToSeconds, msToUs, formatTimecode, clamp } from './utils/time';
export { createLogger, setLogLevel, getLogLevel, type LogLevel, type Logger } from './utils/logger';
export { TIME, TRIMMER, ZOOM, THUMBNAILS } from './constants';
