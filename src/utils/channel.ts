interface PendingReceive<T> {
  resolve: (item: T | undefined) => void;
}

/**
 * Bounded FIFO between one producer and one consumer.
 *
 * The producer side never waits: `tryPush` refuses an item when the channel
 * is full and leaves the queued items untouched. The consumer side waits for
 * at most `timeoutMs` so its loop can check for cancellation between reads.
 */
export class BoundedChannel<T> {
  private queue: T[] = [];
  private pending: PendingReceive<T> | null = null;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Enqueue without waiting. Returns false (and drops `item`) when full.
   */
  tryPush(item: T): boolean {
    if (this.pending) {
      // A waiting consumer implies an empty queue
      const { resolve } = this.pending;
      this.pending = null;
      resolve(item);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      return false;
    }

    this.queue.push(item);
    return true;
  }

  /**
   * Take the oldest item, waiting up to `timeoutMs` for one to arrive.
   * Resolves undefined on timeout or when `signal` aborts.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    const head = this.queue.shift();
    if (head !== undefined) {
      return Promise.resolve(head);
    }
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }
    if (this.pending) {
      return Promise.reject(new Error('BoundedChannel supports a single consumer'));
    }

    return new Promise((resolve) => {
      const finish = (item: T | undefined) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const onAbort = () => {
        this.pending = null;
        finish(undefined);
      };
      const timer = setTimeout(() => {
        this.pending = null;
        finish(undefined);
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = { resolve: finish };
    });
  }

  /**
   * Remove and return everything currently queued.
   */
  drain(): T[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }
}
