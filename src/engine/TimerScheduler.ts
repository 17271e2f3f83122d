/**
 * Default collaborators backed by the host runtime.
 */

import type { FeedbackSink, ScheduledTask, TimerScheduler } from '../core/types';

/**
 * Single-shot timers on the event loop. Cancelling after the task ran is a no-op.
 */
export const systemTimerScheduler: TimerScheduler = {
  schedule(delayMs: number, task: () => void): ScheduledTask {
    const handle = setTimeout(task, delayMs);
    return {
      cancel: () => clearTimeout(handle),
    };
  },
};

/** Feedback sink for hosts without haptics */
export const silentFeedbackSink: FeedbackSink = {
  pulse: () => {},
};
