/**
 * Video Trimmer - ID Generation Utilities
 */

/**
 * Generate a thumbnail tile ID
 */
export function createTileId(): string {
  return `tile-${crypto.randomUUID()}`;
}
