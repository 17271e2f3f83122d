/**
 * Interaction State Machine
 * Turns normalized drag events for the trim handles and the progress
 * control into clamped model updates, feedback pulses and trimmer events.
 */

import type { CoordinateMapper } from '../core/CoordinateMapper';
import type { TimeRangeModel } from '../core/TimeRangeModel';
import type {
  DragSession,
  FeedbackSink,
  InteractionState,
  InteractiveElement,
  PointerInput,
  TrimmerEventType,
  TrimmingState,
} from '../core/types';
import { rangeEnd, rangeFromBounds } from '../core/TimeRange';
import { createLogger } from '../utils/logger';

const logger = createLogger('InteractionStateMachine');

/** What the state machine drives */
export interface InteractionHost {
  model: TimeRangeModel;
  zoom: { noteDragMove(): void; exit(): void };
  feedback: FeedbackSink;
  /** Mapper for the currently visible window */
  mapper(): CoordinateMapper;
  /** Whether the progress control accepts drags right now */
  canScrub(): boolean;
  emit(type: TrimmerEventType): void;
}

interface ClampResult {
  timeUs: number;
  clamped: boolean;
}

export class InteractionStateMachine {
  private readonly host: InteractionHost;
  private session: DragSession | null = null;

  constructor(host: InteractionHost) {
    this.host = host;
  }

  get state(): InteractionState {
    switch (this.session?.element) {
      case 'leading':
        return 'draggingLeading';
      case 'trailing':
        return 'draggingTrailing';
      case 'progress':
      case 'timeline':
        return 'scrubbing';
      default:
        return 'idle';
    }
  }

  get trimmingState(): TrimmingState {
    switch (this.session?.element) {
      case 'leading':
        return 'leading';
      case 'trailing':
        return 'trailing';
      default:
        return 'none';
    }
  }

  get isScrubbing(): boolean {
    return this.state === 'scrubbing';
  }

  /** Current drag session, if any */
  get activeSession(): Readonly<DragSession> | null {
    return this.session;
  }

  /**
   * Feed one pointer event.
   * @returns false when the event was ignored
   */
  handle(element: InteractiveElement, input: PointerInput): boolean {
    if (input.kind === 'begin') {
      return this.begin(element, input.pointerX);
    }

    if (!this.session || this.session.element !== element) {
      logger.debug('Ignoring event without a matching session', { element, kind: input.kind });
      return false;
    }

    if (input.kind === 'move') {
      return this.move(this.session, input.pointerX);
    }

    this.finish(this.session);
    return true;
  }

  /**
   * End the active session as if it was cancelled.
   */
  cancelActive(): void {
    if (this.session) {
      logger.debug('Cancelling active drag', { element: this.session.element });
      this.finish(this.session);
    }
  }

  private begin(element: InteractiveElement, pointerX: number): boolean {
    if (this.session) {
      logger.debug('Ignoring begin while another drag is active', {
        element,
        active: this.session.element,
      });
      return false;
    }

    const { model, feedback } = this.host;

    switch (element) {
      case 'leading':
      case 'trailing': {
        if (!model.hasAsset) return false;
        const mapper = this.host.mapper();
        const edgeUs = element === 'leading'
          ? model.selectedRange.startUs
          : rangeEnd(model.selectedRange);
        this.session = {
          element,
          anchorOffsetPx: mapper.locationForTime(edgeUs) - pointerX,
          lastClampState: false,
        };
        feedback.pulse('selection');
        this.host.emit('beginTrim');
        return true;
      }

      case 'progress':
      case 'timeline': {
        if (!model.hasAsset || !this.host.canScrub()) return false;
        const session: DragSession = { element, anchorOffsetPx: 0, lastClampState: false };
        this.session = session;
        feedback.pulse('selection');
        this.host.emit('beginScrub');
        // a tap on the timeline jumps the progress to the tap location
        if (element === 'timeline') {
          this.move(session, pointerX);
        }
        return true;
      }
    }
  }

  private move(session: DragSession, pointerX: number): boolean {
    const rawUs = this.host.mapper().timeForLocation(pointerX + session.anchorOffsetPx);
    if (rawUs === null) {
      logger.debug('Dropping move on a degenerate timeline', { pointerX });
      return false;
    }

    const { model } = this.host;

    switch (session.element) {
      case 'leading': {
        const endUs = rangeEnd(model.selectedRange);
        const result = this.clampLeading(rawUs, endUs);
        this.updateClampState(session, result.clamped);
        model.setSelectedRange(rangeFromBounds(result.timeUs, endUs));
        this.host.emit('rangeChanged');
        this.host.zoom.noteDragMove();
        return true;
      }

      case 'trailing': {
        const startUs = model.selectedRange.startUs;
        const result = this.clampTrailing(rawUs, startUs);
        this.updateClampState(session, result.clamped);
        model.setSelectedRange(rangeFromBounds(startUs, result.timeUs));
        this.host.emit('rangeChanged');
        this.host.zoom.noteDragMove();
        return true;
      }

      case 'progress':
      case 'timeline': {
        const selected = model.selectedRange;
        let timeUs = rawUs;
        let clamped = false;
        if (timeUs < selected.startUs) {
          timeUs = selected.startUs;
          clamped = true;
        }
        if (timeUs > rangeEnd(selected)) {
          timeUs = rangeEnd(selected);
          clamped = true;
        }
        this.updateClampState(session, clamped);
        model.setProgress(timeUs);
        this.host.emit('progressChanged');
        return true;
      }
    }
  }

  private finish(session: DragSession): void {
    this.session = null;

    if (session.element === 'leading' || session.element === 'trailing') {
      this.host.zoom.exit();
      this.host.emit('endTrim');
    } else {
      this.host.emit('endScrub');
    }
  }

  private clampLeading(candidateUs: number, endUs: number): ClampResult {
    const { assetRange, minimumDurationUs } = this.host.model;
    let timeUs = candidateUs;
    let clamped = false;

    if (endUs - timeUs < minimumDurationUs) {
      timeUs = endUs - minimumDurationUs;
      clamped = true;
    }
    if (timeUs < assetRange.startUs) {
      timeUs = assetRange.startUs;
      clamped = true;
    }
    if (timeUs > rangeEnd(assetRange)) {
      timeUs = rangeEnd(assetRange);
      clamped = true;
    }
    return { timeUs, clamped };
  }

  private clampTrailing(candidateUs: number, startUs: number): ClampResult {
    const { assetRange, minimumDurationUs } = this.host.model;
    let timeUs = candidateUs;
    let clamped = false;

    if (timeUs - startUs < minimumDurationUs) {
      timeUs = startUs + minimumDurationUs;
      clamped = true;
    }
    if (timeUs < assetRange.startUs) {
      timeUs = assetRange.startUs;
      clamped = true;
    }
    if (timeUs > rangeEnd(assetRange)) {
      timeUs = rangeEnd(assetRange);
      clamped = true;
    }
    return { timeUs, clamped };
  }

  /**
   * Impact pulse only on the transition into a clamped state.
   */
  private updateClampState(session: DragSession, clamped: boolean): void {
    if (clamped && !session.lastClampState) {
      this.host.feedback.pulse('impact');
    }
    session.lastClampState = clamped;
  }
}
