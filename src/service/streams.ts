// streams.ts - what a MonitorLoop waits on
import { SeverityFilter } from '../types';
import { EventSource, SubscriptionHandle } from './event-sources/types';

/**
 * A source of work for a MonitorLoop. `next` resolves with the next item,
 * or `null` once the stream is closed or the signal aborts. It never
 * rejects.
 */
export interface EventStream<T> {
  next(signal: AbortSignal): Promise<T | null>;
  close(): void;
}

/**
 * Push-subscribed stream: records delivered by the source callback are
 * queued and handed out one at a time in arrival order.
 */
export class SubscriptionStream<T> implements EventStream<T> {
  private queue: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private handle: SubscriptionHandle | null = null;
  private closed: boolean = false;
  private droppedCount: number = 0;

  constructor(
    private readonly source: EventSource<T>,
    private readonly filter: SeverityFilter,
    private readonly maxPending: number = 10000
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  next(signal: AbortSignal): Promise<T | null> {
    // Subscribe on first use so nothing is queued before the loop runs.
    if (!this.handle && !this.closed) {
      this.handle = this.source.subscribe(this.filter, item => this.push(item));
    }

    if (this.queue.length > 0) {
      const [item] = this.queue.splice(0, 1);
      return Promise.resolve(item);
    }

    if (this.closed || signal.aborted) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      const onAbort = (): void => {
        this.waiter = null;
        resolve(null);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = item => {
        signal.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(item);
      };
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.handle?.unsubscribe();
    this.handle = null;
    this.queue = [];
    this.waiter?.(null);
  }

  private push(item: T): void {
    if (this.closed) {
      return;
    }
    if (this.waiter) {
      this.waiter(item);
      return;
    }
    this.queue.push(item);
    if (this.queue.length > this.maxPending) {
      this.queue.shift();
      this.droppedCount++;
    }
  }
}

/**
 * Timer-driven stream. The next tick is armed only when the loop asks for
 * it, so a slow run pushes the following one back instead of piling up.
 */
export class IntervalStream implements EventStream<number> {
  private ticks: number = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly options: { immediate?: boolean } = {}
  ) {}

  next(signal: AbortSignal): Promise<number | null> {
    if (signal.aborted) {
      return Promise.resolve(null);
    }

    const delay = this.ticks === 0 && this.options.immediate ? 0 : this.intervalMs;

    return new Promise(resolve => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(null);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        this.ticks++;
        resolve(this.ticks);
      }, delay);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    // nothing held between ticks
  }
}
