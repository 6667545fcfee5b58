import { QueueClosedError } from './errors.js';

type Taker<T> = {
  resolve: (item: T) => void;
  reject: (err: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Fixed-capacity FIFO between request handlers (producers) and workers
 * (consumers). `offer` never waits: an item goes straight to an idle taker,
 * into the buffer, or is refused when the buffer is full.
 */
export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Taker<T>[] = [];
  private closed = false;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get waitingTakers(): number {
    return this.takers.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): boolean {
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      this.release(taker);
      taker.resolve(item);
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  take(signal?: AbortSignal): Promise<T> {
    const buffered = this.items.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.closed) return Promise.reject(new QueueClosedError());
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<T>((resolve, reject) => {
      const taker: Taker<T> = { resolve, reject, signal };
      if (signal) {
        taker.onAbort = () => {
          const idx = this.takers.indexOf(taker);
          if (idx >= 0) this.takers.splice(idx, 1);
          reject(signal.reason);
        };
        signal.addEventListener('abort', taker.onAbort, { once: true });
      }
      this.takers.push(taker);
    });
  }

  /**
   * Refuse new items and fail every pending `take`. Buffered items are
   * returned so the caller can account for them.
   */
  close(): T[] {
    if (this.closed) return [];
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      this.release(taker);
      taker.reject(new QueueClosedError());
    }
    return this.items.splice(0);
  }

  private release(taker: Taker<T>) {
    if (taker.signal && taker.onAbort) taker.signal.removeEventListener('abort', taker.onAbort);
  }
}
