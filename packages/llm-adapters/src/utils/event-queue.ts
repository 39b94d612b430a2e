/**
 * Bounded async producer/consumer queue.
 *
 * The producer awaits `push()` while the queue is full; the consumer pulls
 * with `for await`. Either side can end the exchange: the producer with
 * `close()` (remaining items are still delivered), the consumer by breaking
 * out of its loop or calling `return()` (remaining items are dropped and
 * every blocked producer wakes up with `false`).
 */

export const DEFAULT_QUEUE_CAPACITY = 64;

export class EventQueue<T> implements AsyncIterableIterator<T> {
  private items: T[] = [];
  private closed = false;
  private cancelled = false;
  private consumerWaiter: (() => void) | undefined;
  private producerWaiters: Array<() => void> = [];
  private cancelListeners: Array<() => void> = [];

  constructor(readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of buffered items. */
  get size(): number {
    return this.items.length;
  }

  /** True once the consumer has stopped reading. */
  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Enqueue an item, waiting while the queue is full.
   *
   * Resolves `false` when the item was not accepted because the queue was
   * closed or the consumer went away.
   */
  async push(item: T): Promise<boolean> {
    while (this.items.length >= this.capacity && !this.closed && !this.cancelled) {
      await new Promise<void>((resolve) => this.producerWaiters.push(resolve));
    }
    if (this.closed || this.cancelled) return false;

    this.items.push(item);
    this.wakeConsumer();
    return true;
  }

  /** No more items will be pushed. Buffered items are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeConsumer();
    this.wakeProducers();
  }

  /** Consumer-side cancellation. Drops buffered items. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.items = [];
    this.wakeConsumer();
    this.wakeProducers();
    for (const listener of this.cancelListeners.splice(0)) {
      listener();
    }
  }

  /** Run `listener` once when the consumer cancels. */
  onCancel(listener: () => void): void {
    if (this.cancelled) {
      listener();
      return;
    }
    this.cancelListeners.push(listener);
  }

  async next(): Promise<IteratorResult<T>> {
    for (;;) {
      if (this.cancelled) return { done: true, value: undefined };
      if (this.items.length > 0) {
        const value = this.items[0];
        this.items.splice(0, 1);
        this.wakeOneProducer();
        return { done: false, value };
      }
      if (this.closed) return { done: true, value: undefined };
      await new Promise<void>((resolve) => {
        this.consumerWaiter = resolve;
      });
    }
  }

  async return(): Promise<IteratorResult<T>> {
    this.cancel();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private wakeConsumer(): void {
    const waiter = this.consumerWaiter;
    this.consumerWaiter = undefined;
    waiter?.();
  }

  private wakeOneProducer(): void {
    this.producerWaiters.shift()?.();
  }

  private wakeProducers(): void {
    for (const waiter of this.producerWaiters.splice(0)) {
      waiter();
    }
  }
}
