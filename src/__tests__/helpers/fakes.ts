import type {
  FeedbackKind,
  FeedbackSink,
  ScheduledTask,
  ThumbnailBatch,
  ThumbnailGenerator,
  ThumbnailOutcome,
  ThumbnailResult,
  TimerScheduler,
} from '../../core/types';

interface PendingTask {
  dueMs: number;
  order: number;
  task: () => void;
  cancelled: boolean;
}

/**
 * Manually advanced timer scheduler.
 */
export class FakeScheduler implements TimerScheduler {
  nowMs = 0;
  private tasks: PendingTask[] = [];
  private counter = 0;

  schedule(delayMs: number, task: () => void): ScheduledTask {
    const entry: PendingTask = { dueMs: this.nowMs + delayMs, order: this.counter++, task, cancelled: false };
    this.tasks.push(entry);
    return {
      cancel: () => {
        entry.cancelled = true;
      },
    };
  }

  /** Number of tasks scheduled and not yet run or cancelled */
  get pendingCount(): number {
    return this.tasks.filter((entry) => !entry.cancelled).length;
  }

  /** Move the clock forward, running due tasks in order */
  advance(ms: number): void {
    const target = this.nowMs + ms;
    for (;;) {
      const due = this.tasks
        .filter((entry) => !entry.cancelled && entry.dueMs <= target)
        .sort((a, b) => a.dueMs - b.dueMs || a.order - b.order)[0];
      if (!due) break;
      this.tasks = this.tasks.filter((entry) => entry !== due);
      this.nowMs = due.dueMs;
      due.task();
    }
    this.nowMs = target;
    this.tasks = this.tasks.filter((entry) => !entry.cancelled);
  }
}

/**
 * Feedback sink that records every pulse.
 */
export class RecordingFeedback implements FeedbackSink {
  pulses: FeedbackKind[] = [];

  pulse(kind: FeedbackKind): void {
    this.pulses.push(kind);
  }

  count(kind: FeedbackKind): number {
    return this.pulses.filter((pulse) => pulse === kind).length;
  }
}

/**
 * Async iterable fed by the test.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private items: Array<{ value: T }> = [];
  private closed = false;
  private failure: Error | null = null;
  private waiting: { resolve: (result: IteratorResult<T>) => void; reject: (err: Error) => void } | null = null;

  push(item: T): void {
    if (this.waiting) {
      const waiting = this.waiting;
      this.waiting = null;
      waiting.resolve({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
  }

  close(): void {
    this.closed = true;
    if (this.waiting && this.items.length === 0) {
      const waiting = this.waiting;
      this.waiting = null;
      waiting.resolve({ value: undefined, done: true });
    }
  }

  fail(err: Error): void {
    this.failure = err;
    if (this.waiting) {
      const waiting = this.waiting;
      this.waiting = null;
      waiting.reject(err);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const entry = this.items.shift();
        if (entry) {
          return Promise.resolve({ value: entry.value, done: false });
        }
        if (this.failure) return Promise.reject(this.failure);
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve, reject) => {
          this.waiting = { resolve, reject };
        });
      },
    };
  }
}

/**
 * Thumbnail generator whose results are delivered by the test.
 */
export class ControlledThumbnailGenerator implements ThumbnailGenerator<string> {
  batches: ThumbnailBatch[] = [];
  private channels = new Map<number, ResultChannel<ThumbnailResult<string>>>();

  generate(batch: ThumbnailBatch): AsyncIterable<ThumbnailResult<string>> {
    this.batches.push(batch);
    const channel = new ResultChannel<ThumbnailResult<string>>();
    this.channels.set(batch.generation, channel);
    return channel;
  }

  batch(generation: number): ThumbnailBatch {
    const batch = this.batches.find((entry) => entry.generation === generation);
    if (!batch) throw new Error(`No batch for generation ${generation}`);
    return batch;
  }

  /** Deliver the outcome for the request at `index` of a batch */
  deliver(generation: number, index: number, outcome: ThumbnailOutcome<string>): void {
    const request = this.batch(generation).requests[index];
    if (!request) throw new Error(`No request ${index} in generation ${generation}`);
    this.channel(generation).push({ request, outcome });
  }

  complete(generation: number): void {
    this.channel(generation).close();
  }

  fail(generation: number, err: Error): void {
    this.channel(generation).fail(err);
  }

  completeAll(): void {
    for (const channel of this.channels.values()) {
      channel.close();
    }
  }

  private channel(generation: number): ResultChannel<ThumbnailResult<string>> {
    const channel = this.channels.get(generation);
    if (!channel) throw new Error(`No channel for generation ${generation}`);
    return channel;
  }
}

/**
 * Generator that answers every request immediately, in reverse order,
 * with an image named after the requested time.
 */
export const instantThumbnailGenerator: ThumbnailGenerator<string> = {
  async *generate(batch: ThumbnailBatch): AsyncIterable<ThumbnailResult<string>> {
    for (const request of [...batch.requests].reverse()) {
      yield { request, outcome: { status: 'ready', image: `frame@${request.timeUs}` } };
    }
  },
};
