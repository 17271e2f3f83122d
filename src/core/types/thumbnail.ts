/**
 * Video Trimmer - Thumbnail Type Definitions
 */

import type { PixelFrame } from './timeline';

/** One thumbnail slot on the strip */
export interface ThumbnailTile<TImage> {
  id: string;
  timeUs: number;
  /** Batch that created the tile; results for older batches are ignored */
  generation: number;
  image: TImage | null;
  /** True once the image arrived and should cross-fade in */
  fadeIn: boolean;
}

export type TilePhase = 'active' | 'retiring';

export type TileTransition = 'none' | 'crossfade' | 'fadeOut';

/** Where and how the renderer should draw one tile */
export interface TilePlacement<TImage> {
  tileId: string;
  generation: number;
  timeUs: number;
  frame: PixelFrame;
  /** null renders as an empty placeholder */
  image: TImage | null;
  phase: TilePhase;
  transition: TileTransition;
}
