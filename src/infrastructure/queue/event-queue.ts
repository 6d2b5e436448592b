interface Waiter<T> {
  resolve: (item: T | null) => void;
  detach: () => void;
}

/**
 * Fixed-capacity FIFO between the HTTP surface and the worker pool.
 *
 * `tryEnqueue` never waits: it hands the item to an idle consumer,
 * buffers it, or reports the queue as full. Consumers wait in
 * `dequeue()` until an item arrives or their signal aborts.
 */
export class EventQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of buffered items. */
  get size(): number {
    return this.items.length;
  }

  /** Returns `false`, keeping nothing, when the buffer is full. */
  tryEnqueue(item: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter.detach();
      waiter.resolve(item);
      return true;
    }

    if (this.items.length >= this.capacity) return false;

    this.items.push(item);
    return true;
  }

  /**
   * Takes the oldest item, waiting for one if the queue is empty.
   * Resolves `null` once `signal` aborts.
   */
  dequeue(signal: AbortSignal): Promise<T | null> {
    if (signal.aborted) return Promise.resolve(null);

    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);

    return new Promise<T | null>((resolve) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        resolve(null);
      };

      const waiter: Waiter<T> = {
        resolve,
        detach: () => signal.removeEventListener('abort', onAbort),
      };

      signal.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Empties the buffer and returns how many items were dropped. */
  drain(): number {
    const dropped = this.items.length;
    this.items.length = 0;
    return dropped;
  }
}
