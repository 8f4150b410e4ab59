export const END_OF_STREAM: unique symbol = Symbol("scardlens.end-of-stream");
export type EndOfStream = typeof END_OF_STREAM;

interface Slot<T> {
  value: T;
}

/**
 * Unbounded single-producer/single-consumer FIFO. `take()` resolves with the
 * next pushed value, or with `END_OF_STREAM` once the channel is closed and
 * drained.
 */
export class Channel<T> {
  private slots: Slot<T>[] = [];
  private head = 0;
  private waiter: ((item: T | EndOfStream) => void) | null = null;
  private closed = false;

  get size(): number {
    return this.slots.length - this.head;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) {
      throw new Error("push on a closed channel");
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(value);
      return;
    }
    this.slots.push({ value });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(END_OF_STREAM);
    }
  }

  /** Consumer side: stop reading, drop what is buffered and refuse further values. */
  abandon(): void {
    this.slots = [];
    this.head = 0;
    this.close();
  }

  take(): Promise<T | EndOfStream> {
    const slot = this.slots[this.head];
    if (slot) {
      this.head += 1;
      if (this.head > 1024 && this.head * 2 > this.slots.length) {
        this.slots = this.slots.slice(this.head);
        this.head = 0;
      }
      return Promise.resolve(slot.value);
    }
    if (this.closed) {
      return Promise.resolve(END_OF_STREAM);
    }
    if (this.waiter) {
      return Promise.reject(new Error("channel already has a pending consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
