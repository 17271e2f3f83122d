/**
 * Video Trimmer - Time Range Model
 * Asset range, selected range, minimum duration and progress.
 *
 * Invariants after every mutation:
 *   asset.start <= selected.start <= selected.end <= asset.end
 *   selected.duration >= min(minimumDuration, asset.duration)
 */

import type { TimeRange } from './types';
import { TrimmerError } from './errors';
import { EMPTY_RANGE, createRange, rangeEnd, rangeFromBounds, rangesEqual } from './TimeRange';
import { clamp } from '../utils/time';

export type ModelChange = 'asset' | 'selectedRange' | 'progress' | 'minimumDuration';

export type ModelListener = (change: ModelChange) => void;

export class TimeRangeModel {
  private _assetRange: TimeRange = EMPTY_RANGE;
  private _selectedRange: TimeRange = EMPTY_RANGE;
  private _minimumDurationUs = 0;
  private _progressUs = 0;
  private _hasAsset = false;

  private listeners = new Set<ModelListener>();

  get assetRange(): TimeRange {
    return this._assetRange;
  }

  get selectedRange(): TimeRange {
    return this._selectedRange;
  }

  get minimumDurationUs(): number {
    return this._minimumDurationUs;
  }

  get progressUs(): number {
    return this._progressUs;
  }

  get hasAsset(): boolean {
    return this._hasAsset;
  }

  /**
   * Subscribe to model changes.
   * @returns Unsubscribe function
   */
  subscribe(listener: ModelListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Reset the model for a newly attached asset: the whole asset is selected
   * and progress returns to the start.
   */
  attachAsset(durationUs: number): void {
    if (!Number.isFinite(durationUs) || durationUs < 0) {
      throw new TrimmerError('INVALID_DURATION', `Asset duration must be a non-negative number, got ${durationUs}`);
    }

    this._assetRange = createRange(0, Math.round(durationUs));
    this._selectedRange = this._assetRange;
    this._progressUs = 0;
    this._hasAsset = true;
    this.notify('asset');
  }

  /**
   * Store a selected range, normalized into the invariants first.
   * @returns The range actually stored
   */
  setSelectedRange(range: TimeRange): TimeRange {
    const normalized = this.normalizeRange(range);
    if (!rangesEqual(normalized, this._selectedRange)) {
      this._selectedRange = normalized;
      this.notify('selectedRange');
    }
    return normalized;
  }

  /** Non-finite times are ignored */
  setProgress(timeUs: number): void {
    if (!Number.isFinite(timeUs)) return;
    const rounded = Math.round(timeUs);
    if (rounded === this._progressUs) return;
    this._progressUs = rounded;
    this.notify('progress');
  }

  /**
   * Set the shortest allowed selection. The current selection is
   * re-normalized so it keeps honoring the new minimum.
   */
  setMinimumDuration(durationUs: number): void {
    const value = Number.isFinite(durationUs) ? Math.max(0, Math.round(durationUs)) : 0;
    if (value === this._minimumDurationUs) return;
    this._minimumDurationUs = value;
    this.notify('minimumDuration');
    this.setSelectedRange(this._selectedRange);
  }

  /**
   * Shortest selection the invariants allow for the current asset
   */
  get effectiveMinimumUs(): number {
    return Math.min(this._minimumDurationUs, this._assetRange.durationUs);
  }

  /**
   * Clamp a range into the asset, then grow or shift it to the effective minimum.
   * A non-finite start or duration keeps the current selection's start or end.
   */
  normalizeRange(range: TimeRange): TimeRange {
    const assetStart = this._assetRange.startUs;
    const assetEnd = rangeEnd(this._assetRange);
    const required = this.effectiveMinimumUs;

    const current = this._selectedRange;
    const rawStart = Number.isFinite(range.startUs) ? range.startUs : current.startUs;
    const rawEnd = Number.isFinite(range.durationUs) ? rawStart + range.durationUs : rangeEnd(current);

    let start = clamp(Math.round(rawStart), assetStart, assetEnd);
    let end = clamp(Math.round(rawEnd), assetStart, assetEnd);
    if (end < start) end = start;

    if (end - start < required) {
      end = start + required;
      if (end > assetEnd) {
        end = assetEnd;
        start = end - required;
      }
    }

    return rangeFromBounds(start, end);
  }

  private notify(change: ModelChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
