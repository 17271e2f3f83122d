/**
 * Video Trimmer - useVideoTrimmer Hook
 * React binding for a VideoTrimmer instance.
 */

import { useCallback, useSyncExternalStore } from 'react';
import type { VideoTrimmer } from '../engine/VideoTrimmer';
import type {
  InteractiveElement,
  PointerInput,
  TilePlacement,
  TrimmerSnapshot,
  ViewportSize,
} from '../core/types';

export interface UseVideoTrimmerReturn<TImage> {
  /** Current trimmer state */
  snapshot: TrimmerSnapshot;
  /** Thumbnail placements to draw */
  tiles: TilePlacement<TImage>[];
  /** Forward a normalized pointer event */
  handlePointer: (element: InteractiveElement, input: PointerInput) => boolean;
  /** Report the control's measured size */
  setViewport: (viewport: ViewportSize) => void;
}

/**
 * Subscribe a component to a trimmer; re-renders on every state or tile change.
 *
 * @example
 * ```tsx
 * const { snapshot, tiles, handlePointer } = useVideoTrimmer(trimmer);
 * ```
 */
export function useVideoTrimmer<TImage>(trimmer: VideoTrimmer<TImage>): UseVideoTrimmerReturn<TImage> {
  const subscribe = useCallback((onStoreChange: () => void) => trimmer.subscribe(onStoreChange), [trimmer]);

  const snapshot = useSyncExternalStore(subscribe, () => trimmer.getSnapshot());
  const tiles = useSyncExternalStore(subscribe, () => trimmer.layoutTiles());

  const handlePointer = useCallback(
    (element: InteractiveElement, input: PointerInput) => trimmer.handlePointer(element, input),
    [trimmer]
  );

  const setViewport = useCallback(
    (viewport: ViewportSize) => trimmer.setViewport(viewport),
    [trimmer]
  );

  return { snapshot, tiles, handlePointer, setViewport };
}
