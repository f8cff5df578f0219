/**
 * EventBuffer
 *
 * Append-only event log with fan-out. Subscribers see events from the
 * moment they subscribe (`on`) or the whole retained history first
 * (`onReplay`). Async iteration replays the retained history and then
 * follows live pushes until the buffer closes or errors.
 *
 * With a `capacity`, only the newest `capacity` events are retained; older
 * ones are dropped from history (and counted in `dropped`). Iterators that
 * already hold a queue are unaffected by later drops.
 *
 * @module @switchyard/kernel/event-buffer
 */

export type EventHandler<T> = (event: T) => void;

export interface EventBufferOptions {
  /** Maximum retained events. Unbounded when omitted. */
  capacity?: number;
}

export class EventBuffer<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private handlers = new Set<EventHandler<T>>();
  private settleHandlers = new Set<() => void>();
  private _closed = false;
  private _error: Error | null = null;
  private _dropped = 0;
  private readonly capacity: number;

  constructor(options: EventBufferOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
  }

  push(event: T): void {
    if (this._closed) return;

    this.buffer.push(event);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this._dropped++;
    }

    for (const handler of [...this.handlers]) {
      handler(event);
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.settle();
  }

  error(err: Error): void {
    if (this._closed) return;
    this._error = err;
    this._closed = true;
    this.settle();
  }

  /** Subscribe from now on. Returns an unsubscribe function. */
  on(handler: EventHandler<T>): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Deliver retained history, then subscribe. */
  onReplay(handler: EventHandler<T>): () => void {
    for (const event of [...this.buffer]) {
      handler(event);
    }
    return this.on(handler);
  }

  /** Drop retained history and listeners; the buffer closes. */
  release(): void {
    this.buffer = [];
    this.handlers.clear();
    this.close();
  }

  getBuffer(): readonly T[] {
    return this.buffer;
  }

  get length(): number {
    return this.buffer.length;
  }

  /** Events evicted by the capacity bound */
  get dropped(): number {
    return this._dropped;
  }

  get closed(): boolean {
    return this._closed;
  }

  get listenerCount(): number {
    return this.handlers.size;
  }

  [Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    return this.follow();
  }

  /**
   * Snapshot the retained history and subscribe to live pushes right now.
   * Iteration may begin later without missing anything pushed in between.
   */
  follow(): AsyncGenerator<T, void, undefined> {
    const cursor: FollowCursor<T> = { queue: [...this.buffer], head: 0, wake: null };

    const unsubscribe = this.on((event) => {
      cursor.queue.push(event);
      cursor.wake?.();
    });
    const onSettle = () => cursor.wake?.();
    this.settleHandlers.add(onSettle);

    return this.drain(cursor, () => {
      unsubscribe();
      this.settleHandlers.delete(onSettle);
    });
  }

  private settle(): void {
    for (const handler of [...this.settleHandlers]) {
      handler();
    }
  }

  private async *drain(
    cursor: FollowCursor<T>,
    detach: () => void,
  ): AsyncGenerator<T, void, undefined> {
    try {
      for (;;) {
        if (cursor.head < cursor.queue.length) {
          const event = cursor.queue[cursor.head++];
          if (cursor.head === cursor.queue.length) {
            cursor.queue.length = 0;
            cursor.head = 0;
          }
          yield event;
          continue;
        }
        if (this._error) throw this._error;
        if (this._closed) return;
        await new Promise<void>((resolve) => {
          cursor.wake = resolve;
        });
        cursor.wake = null;
      }
    } finally {
      detach();
    }
  }
}

interface FollowCursor<T> {
  queue: T[];
  head: number;
  wake: (() => void) | null;
}
