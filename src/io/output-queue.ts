/**
 * OutputQueue - bounded FIFO hand-off between the matching task and the
 * writing task.
 *
 * The producer awaits push(), which blocks while the queue is full. The
 * consumer iterates the queue. Items come out in exactly the order they went
 * in. cancel() is the consumer's way of saying it is gone: buffered items are
 * dropped and every pending or later push() resolves to false.
 */

export class OutputQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly itemWaiters: Array<() => void> = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private closed = false;
  private cancelled = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Queue capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Enqueue an item, waiting for room if the queue is full.
   * @returns false if the consumer cancelled the queue
   */
  async push(item: T): Promise<boolean> {
    if (this.closed) {
      throw new Error("OutputQueue: push after close()");
    }
    while (!this.cancelled && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.cancelled) {
      return false;
    }
    this.items.push(item);
    this.wake(this.itemWaiters);
    return true;
  }

  /**
   * Producer is done; the consumer drains what is left and stops.
   */
  close(): void {
    this.closed = true;
    this.wakeAll(this.itemWaiters);
  }

  /**
   * Consumer is gone; drop buffered items and release the producer.
   */
  cancel(): void {
    this.cancelled = true;
    this.items.length = 0;
    this.wakeAll(this.spaceWaiters);
    this.wakeAll(this.itemWaiters);
  }

  /**
   * Take the next item, or done once the queue is closed and empty.
   */
  async next(): Promise<IteratorResult<T, undefined>> {
    while (this.items.length === 0 && !this.closed && !this.cancelled) {
      await new Promise<void>((resolve) => this.itemWaiters.push(resolve));
    }
    if (this.items.length === 0) {
      return { done: true, value: undefined };
    }
    const value = this.items[0];
    this.items.shift();
    this.wake(this.spaceWaiters);
    return { done: false, value };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }

  private wake(waiters: Array<() => void>): void {
    waiters.shift()?.();
  }

  private wakeAll(waiters: Array<() => void>): void {
    for (const resolve of waiters.splice(0)) {
      resolve();
    }
  }
}
