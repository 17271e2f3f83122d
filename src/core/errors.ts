/**
 * Video Trimmer - Errors
 */

export type TrimmerErrorCode = 'INVALID_DURATION' | 'INVALID_CONFIG' | 'DISPOSED';

/**
 * Error raised for invalid host input. Gesture input never raises;
 * it is clamped instead.
 */
export class TrimmerError extends Error {
  constructor(
    public readonly code: TrimmerErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'TrimmerError';
  }
}
