/**
 * Video Trimmer - Input Type Definitions
 * Normalized pointer events delivered by the host's gesture layer.
 */

/** Interactive element a gesture was resolved to */
export type InteractiveElement = 'leading' | 'trailing' | 'progress' | 'timeline';

/** Gesture phase */
export type PointerEventKind = 'begin' | 'move' | 'end' | 'cancel';

/** Normalized drag event in the control's coordinate space */
export interface PointerInput {
  kind: PointerEventKind;
  /** Horizontal pointer position in pixels, relative to the control's left edge */
  pointerX: number;
}

/** Transient per-gesture state, alive from begin to end/cancel */
export interface DragSession {
  element: InteractiveElement;
  /** Added to the pointer position so the grab point keeps its offset from the handle edge */
  anchorOffsetPx: number;
  /** Whether the previous move was bound-limited */
  lastClampState: boolean;
}
