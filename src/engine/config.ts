/**
 * Trimmer configuration defaults and validation.
 */

import type { TrimmerConfig } from '../core/types';
import { TrimmerError } from '../core/errors';
import { THUMBNAILS, TRIMMER, ZOOM } from '../constants';

export const DEFAULT_TRIMMER_CONFIG: Readonly<TrimmerConfig> = Object.freeze({
  horizontalInset: TRIMMER.HORIZONTAL_INSET,
  chevronWidth: TRIMMER.CHEVRON_WIDTH,
  edgeHeight: TRIMMER.EDGE_HEIGHT,
  devicePixelRatio: TRIMMER.DEVICE_PIXEL_RATIO,
  zoomDwellMs: ZOOM.DWELL_MS,
  maxZoomDurationUs: ZOOM.MAX_DURATION_US,
  zoomAssetFraction: ZOOM.ASSET_FRACTION,
  tilePaddingBefore: THUMBNAILS.PADDING_BEFORE,
  tilePaddingAfter: THUMBNAILS.PADDING_AFTER,
  tileFadeDelayMs: THUMBNAILS.FADE_DELAY_MS,
  tileFadeDurationMs: THUMBNAILS.FADE_DURATION_MS,
});

const INTEGER_KEYS: ReadonlyArray<keyof TrimmerConfig> = ['tilePaddingBefore', 'tilePaddingAfter'];

/**
 * Merge a partial configuration over the defaults.
 * @throws TrimmerError when a value is negative or not finite
 */
export function resolveConfig(overrides: Partial<TrimmerConfig> = {}): TrimmerConfig {
  const config: TrimmerConfig = { ...DEFAULT_TRIMMER_CONFIG, ...overrides };

  for (const [key, value] of Object.entries(config)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new TrimmerError('INVALID_CONFIG', `Config "${key}" must be a non-negative number`, { key, value });
    }
  }

  for (const key of INTEGER_KEYS) {
    if (!Number.isInteger(config[key])) {
      throw new TrimmerError('INVALID_CONFIG', `Config "${key}" must be an integer`, { key, value: config[key] });
    }
  }

  if (config.devicePixelRatio === 0) {
    throw new TrimmerError('INVALID_CONFIG', 'Config "devicePixelRatio" must be positive', { key: 'devicePixelRatio' });
  }

  return config;
}
