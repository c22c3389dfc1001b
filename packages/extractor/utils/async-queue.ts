/**
 * Bounded async queue with backpressure support.
 * Push waits when full, pop waits when empty. After close, pushes are
 * dropped and pop drains what is left before returning null.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waitingPushers: (() => void)[] = [];
  private waitingPoppers: ((value: T | null) => void)[] = [];
  private closed = false;

  constructor(private maxSize: number = 1000) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Returns false when the queue was closed before the item could be added.
   */
  async push(item: T): Promise<boolean> {
    while (!this.closed && this.items.length >= this.maxSize) {
      await new Promise<void>((resolve) => this.waitingPushers.push(resolve));
    }
    if (this.closed) return false;

    const popper = this.waitingPoppers.shift();
    if (popper) {
      popper(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  async pop(): Promise<T | null> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) {
        this.waitingPushers.shift()?.();
        return item;
      }
    }
    if (this.closed) return null;
    return new Promise((resolve) => this.waitingPoppers.push(resolve));
  }

  close() {
    this.closed = true;
    for (const resolve of this.waitingPoppers) {
      resolve(null);
    }
    this.waitingPoppers = [];
    for (const resolve of this.waitingPushers) {
      resolve();
    }
    this.waitingPushers = [];
  }
}
