import { describe, it, expect, beforeEach, vi } from 'vitest';
import { VideoTrimmer } from '../../engine/VideoTrimmer';
import { TrimmerError } from '../../core/errors';
import type { AssetMetadata, TrimmerEvent, TrimmerEventType } from '../../core/types';
import {
  ControlledThumbnailGenerator,
  FakeScheduler,
  RecordingFeedback,
  instantThumbnailGenerator,
} from '../helpers/fakes';

const TEN_SECONDS: AssetMetadata = {
  durationUs: 10_000_000,
  naturalSize: { width: 100, height: 50 },
};

// 300px wide: 32px inset + chevron on each side, 236px of timeline
const VIEWPORT = { width: 300, height: 58 };

describe('VideoTrimmer', () => {
  let scheduler: FakeScheduler;
  let feedback: RecordingFeedback;
  let trimmer: VideoTrimmer<string>;
  let events: TrimmerEvent[];

  const types = (): TrimmerEventType[] => events.map((event) => event.type);

  beforeEach(() => {
    scheduler = new FakeScheduler();
    feedback = new RecordingFeedback();
    trimmer = new VideoTrimmer<string>({ scheduler, feedback, viewport: VIEWPORT });
    events = [];
    trimmer.on((event) => {
      events.push(event);
    });
  });

  describe('attachAsset', () => {
    it('should select the whole asset', () => {
      trimmer.attachAsset(TEN_SECONDS);

      const snapshot = trimmer.getSnapshot();
      expect(snapshot.assetRange).toEqual({ startUs: 0, durationUs: 10_000_000 });
      expect(snapshot.selectedRange).toEqual({ startUs: 0, durationUs: 10_000_000 });
      expect(snapshot.visibleRange).toEqual({ startUs: 0, durationUs: 10_000_000 });
      expect(snapshot.progressUs).toBe(0);
      expect(snapshot.trimmingState).toBe('none');
    });

    it('should reject a negative duration', () => {
      expect(() => trimmer.attachAsset({ ...TEN_SECONDS, durationUs: -1 })).toThrow(TrimmerError);
    });

    it('should end a drag in progress and reset the selection', () => {
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 150 });
      scheduler.advance(500);
      expect(trimmer.isZoomedIn).toBe(true);

      trimmer.attachAsset({ ...TEN_SECONDS, durationUs: 4_000_000 });

      expect(types()).toEqual(['beginTrim', 'rangeChanged', 'endTrim']);
      expect(trimmer.trimmingState).toBe('none');
      expect(trimmer.isZoomedIn).toBe(false);
      expect(trimmer.selectedRange).toEqual({ startUs: 0, durationUs: 4_000_000 });
      expect(trimmer.handlePointer('leading', { kind: 'move', pointerX: 100 })).toBe(false);
    });
  });

  describe('trimming', () => {
    beforeEach(() => {
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.setMinimumDuration(1_000_000);
    });

    it('should clamp the leading edge a minimum duration before the end', () => {
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      // 9.6 seconds
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 258.56 });

      expect(trimmer.selectedRange).toEqual({ startUs: 9_000_000, durationUs: 1_000_000 });
      expect(types()).toEqual(['beginTrim', 'rangeChanged']);
      expect(feedback.pulses).toEqual(['selection', 'impact']);

      const changed = events[1]?.snapshot;
      expect(changed?.trimmingState).toBe('leading');
      expect(changed?.selectedTimeUs).toBe(9_000_000);
    });

    it('should pulse once for consecutive clamped moves', () => {
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 258.56 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 262 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 280 });

      expect(feedback.count('impact')).toBe(1);
    });

    it('should report the trailing edge as the selected time', () => {
      trimmer.handlePointer('trailing', { kind: 'begin', pointerX: 268 });
      trimmer.handlePointer('trailing', { kind: 'move', pointerX: 150 });

      expect(trimmer.selectedTimeUs).toBe(5_000_000);
      expect(trimmer.interactionState).toBe('draggingTrailing');
    });

    it('should emit endTrim with the final range', () => {
      trimmer.handlePointer('trailing', { kind: 'begin', pointerX: 268 });
      trimmer.handlePointer('trailing', { kind: 'move', pointerX: 150 });
      trimmer.handlePointer('trailing', { kind: 'end', pointerX: 150 });

      const last = events[events.length - 1];
      expect(last?.type).toBe('endTrim');
      expect(last?.snapshot.selectedRange).toEqual({ startUs: 0, durationUs: 5_000_000 });
      expect(last?.snapshot.trimmingState).toBe('none');
      expect(last?.snapshot.selectedTimeUs).toBe(0);
    });
  });

  describe('zoom', () => {
    beforeEach(() => {
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 150 });
    });

    it('should zoom around the dragged edge after a pause', () => {
      scheduler.advance(499);
      expect(trimmer.isZoomedIn).toBe(false);

      scheduler.advance(1);

      expect(trimmer.isZoomedIn).toBe(true);
      expect(trimmer.visibleRange).toEqual({ startUs: 4_000_000, durationUs: 2_000_000 });
      expect(trimmer.getSnapshot().zoomedRange).toEqual({ startUs: 4_000_000, durationUs: 2_000_000 });
      expect(feedback.count('impact')).toBe(1);
    });

    it('should keep the edge under the pointer once zoomed', () => {
      scheduler.advance(500);

      expect(trimmer.coordinateMapper.locationForTime(5_000_000)).toBe(150);
    });

    it('should map moves through the zoomed window', () => {
      scheduler.advance(500);

      trimmer.handlePointer('leading', { kind: 'move', pointerX: 32 });

      expect(trimmer.selectedRange.startUs).toBe(4_000_000);
    });

    it('should leave zoom when the drag ends', () => {
      scheduler.advance(500);

      trimmer.handlePointer('leading', { kind: 'end', pointerX: 150 });

      expect(trimmer.isZoomedIn).toBe(false);
      expect(trimmer.visibleRange).toEqual({ startUs: 0, durationUs: 10_000_000 });
    });

    it('should not zoom when the drag ends before the pause', () => {
      trimmer.handlePointer('leading', { kind: 'end', pointerX: 150 });
      scheduler.advance(1000);

      expect(trimmer.isZoomedIn).toBe(false);
    });
  });

  describe('scrubbing', () => {
    beforeEach(() => {
      trimmer.attachAsset(TEN_SECONDS);
    });

    it('should clamp progress to the selection start', () => {
      trimmer.handlePointer('progress', { kind: 'begin', pointerX: 32 });
      // -2 seconds
      trimmer.handlePointer('progress', { kind: 'move', pointerX: -15.2 });

      expect(trimmer.progressUs).toBe(0);
      expect(types().filter((type) => type === 'progressChanged')).toHaveLength(1);
      expect(trimmer.isScrubbing).toBe(true);
    });

    it('should scrub only while the indicator is visible', () => {
      trimmer.setProgressIndicatorMode('alwaysHidden');

      expect(trimmer.handlePointer('progress', { kind: 'begin', pointerX: 150 })).toBe(false);
      expect(trimmer.handlePointer('timeline', { kind: 'begin', pointerX: 150 })).toBe(false);
    });

    it('should jump to a tap on the timeline', () => {
      trimmer.handlePointer('timeline', { kind: 'begin', pointerX: 150 });
      trimmer.handlePointer('timeline', { kind: 'end', pointerX: 150 });

      expect(trimmer.progressUs).toBe(5_000_000);
      expect(types()).toEqual(['beginScrub', 'progressChanged', 'endScrub']);
    });
  });

  describe('progress indicator', () => {
    beforeEach(() => {
      trimmer.attachAsset(TEN_SECONDS);
    });

    it('should hide while trimming by default', () => {
      expect(trimmer.isProgressIndicatorVisible).toBe(true);

      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });

      expect(trimmer.isProgressIndicatorVisible).toBe(false);
      expect(events[0]?.snapshot.isProgressIndicatorVisible).toBe(false);
    });

    it('should stay visible while trimming when always shown', () => {
      trimmer.setProgressIndicatorMode('alwaysShown');
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });

      expect(trimmer.isProgressIndicatorVisible).toBe(true);
    });
  });

  describe('setProgress', () => {
    beforeEach(() => {
      trimmer.attachAsset(TEN_SECONDS);
    });

    it('should record whether the change is animated', () => {
      trimmer.setProgress(3_000_000, true);

      expect(trimmer.progressUs).toBe(3_000_000);
      expect(trimmer.getSnapshot().animateProgress).toBe(true);
    });

    it('should clear the animation flag when a gesture moves progress', () => {
      trimmer.setProgress(3_000_000, true);

      trimmer.handlePointer('timeline', { kind: 'begin', pointerX: 150 });

      expect(trimmer.getSnapshot().animateProgress).toBe(false);
    });

    it('should not emit gesture events', () => {
      trimmer.setProgress(3_000_000);

      expect(events).toEqual([]);
    });

    it('should ignore a time that is not finite', () => {
      const listener = vi.fn();
      trimmer.subscribe(listener);

      trimmer.setProgress(Number.NaN, true);

      expect(trimmer.progressUs).toBe(0);
      expect(trimmer.getSnapshot().animateProgress).toBe(false);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should not notify for an unchanged value', () => {
      const listener = vi.fn();
      trimmer.subscribe(listener);

      trimmer.setProgress(0);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('setSelectedRange', () => {
    it('should return the normalized range', () => {
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.setMinimumDuration(1_000_000);

      expect(trimmer.setSelectedRange({ startUs: 9_800_000, durationUs: 100_000 })).toEqual({
        startUs: 9_000_000,
        durationUs: 1_000_000,
      });
    });
  });

  describe('snapshots', () => {
    it('should return the same object until something changes', () => {
      trimmer.attachAsset(TEN_SECONDS);
      const first = trimmer.getSnapshot();

      expect(trimmer.getSnapshot()).toBe(first);

      trimmer.setProgress(1_000_000);
      expect(trimmer.getSnapshot()).not.toBe(first);
    });

    it('should notify subscribers of changes', () => {
      const listener = vi.fn();
      trimmer.subscribe(listener);

      trimmer.attachAsset(TEN_SECONDS);

      expect(listener).toHaveBeenCalled();
    });
  });

  describe('thumbnails', () => {
    it('should stay empty without a generator', () => {
      trimmer.attachAsset(TEN_SECONDS);

      expect(trimmer.layoutTiles()).toEqual([]);
    });

    it('should lay out generated tiles', async () => {
      trimmer = new VideoTrimmer<string>({
        scheduler,
        thumbnailGenerator: instantThumbnailGenerator,
        viewport: VIEWPORT,
      });
      trimmer.attachAsset(TEN_SECONDS);
      await trimmer.whenThumbnailsIdle();

      const tiles = trimmer.layoutTiles();
      // three 100px tiles across plus six after; the three before would be negative
      expect(tiles).toHaveLength(9);
      expect(tiles[0]?.image).toBe('frame@0');
      expect(tiles[0]?.frame).toEqual({ x: 32, y: 4, width: 100, height: 50 });
      expect(trimmer.layoutTiles()).toBe(tiles);
    });

    it('should request a new batch for the zoomed window', () => {
      const generator = new ControlledThumbnailGenerator();
      trimmer = new VideoTrimmer<string>({ scheduler, thumbnailGenerator: generator, viewport: VIEWPORT });
      trimmer.attachAsset(TEN_SECONDS);

      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 150 });
      scheduler.advance(500);

      expect(generator.batches).toHaveLength(2);
      expect(generator.batch(2).requests).toHaveLength(12);
      expect(generator.batch(2).requests[0]?.timeUs).toBe(2_000_000);
      generator.completeAll();
    });

    it('should request one batch for the new asset when re-attached while zoomed', () => {
      const generator = new ControlledThumbnailGenerator();
      trimmer = new VideoTrimmer<string>({ scheduler, thumbnailGenerator: generator, viewport: VIEWPORT });
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 150 });
      scheduler.advance(500);
      expect(generator.batches).toHaveLength(2);

      trimmer.attachAsset({ ...TEN_SECONDS, durationUs: 4_000_000 });

      expect(generator.batches).toHaveLength(3);
      // three tiles across 4 seconds plus six after
      const requests = generator.batch(3).requests;
      expect(requests).toHaveLength(9);
      expect(requests[0]?.timeUs).toBe(0);
      expect(requests[8]?.timeUs).toBe(10_666_667);
      generator.completeAll();
    });

    it('should request a new batch when the viewport is resized', () => {
      const generator = new ControlledThumbnailGenerator();
      trimmer = new VideoTrimmer<string>({ scheduler, thumbnailGenerator: generator });
      trimmer.attachAsset(TEN_SECONDS);
      expect(generator.batches).toHaveLength(0);

      trimmer.setViewport(VIEWPORT);

      expect(generator.batches).toHaveLength(1);
      generator.completeAll();
    });
  });

  describe('configuration', () => {
    it('should reject invalid overrides', () => {
      expect(() => new VideoTrimmer({ config: { zoomDwellMs: -1 } })).toThrow(TrimmerError);
    });

    it('should use the configured dwell time', () => {
      trimmer = new VideoTrimmer<string>({ scheduler, viewport: VIEWPORT, config: { zoomDwellMs: 200 } });
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 150 });

      scheduler.advance(200);

      expect(trimmer.isZoomedIn).toBe(true);
    });
  });

  describe('dispose', () => {
    it('should reject mutations afterwards', () => {
      trimmer.dispose();

      expect(() => trimmer.attachAsset(TEN_SECONDS)).toThrow(TrimmerError);
      expect(() => trimmer.setProgress(1)).toThrow('VideoTrimmer has been disposed');
      expect(trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 })).toBe(false);
    });

    it('should cancel a pending zoom', () => {
      trimmer.attachAsset(TEN_SECONDS);
      trimmer.handlePointer('leading', { kind: 'begin', pointerX: 32 });
      trimmer.handlePointer('leading', { kind: 'move', pointerX: 150 });

      trimmer.dispose();
      scheduler.advance(500);

      expect(trimmer.isZoomedIn).toBe(false);
    });
  });
});
