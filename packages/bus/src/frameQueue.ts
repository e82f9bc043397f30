/**
 * Bounded hand-off queue between the transport's receive callback and
 * fan-out.
 *
 * Fixed-capacity ring buffer. When full, the oldest entry is dropped so that
 * `push` never blocks the transport. Entries are delivered to the consumer on
 * a later macrotask, in push order.
 */
export class FrameQueue<T> {
  private readonly capacity: number;
  private readonly consumer: (item: T) => void;
  private readonly onError: (err: unknown) => void;
  private readonly onOverflow?: (droppedTotal: number) => void;

  private readonly slots: Array<T | undefined>;
  private head: number = 0;
  private size: number = 0;
  private drainScheduled: boolean = false;
  private closed: boolean = false;

  private dropped: number = 0;

  constructor(
    capacity: number,
    consumer: (item: T) => void,
    onError: (err: unknown) => void,
    onOverflow?: (droppedTotal: number) => void
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Queue capacity must be a positive integer: ${capacity}`
      );
    }
    this.capacity = capacity;
    this.consumer = consumer;
    this.onError = onError;
    this.onOverflow = onOverflow;
    this.slots = new Array<T | undefined>(capacity);
  }

  /**
   * Enqueue an item; returns false if the oldest item was dropped for it
   */
  push(item: T): boolean {
    if (this.closed) return false;

    let accepted = true;

    if (this.size === this.capacity) {
      // Drop oldest
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.size--;
      this.dropped++;
      accepted = false;
      this.onOverflow?.(this.dropped);
    }

    this.slots[(this.head + this.size) % this.capacity] = item;
    this.size++;
    this.scheduleDrain();

    return accepted;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  /**
   * Deliver everything currently queued
   */
  private drain(): void {
    this.drainScheduled = false;

    // Items pushed during the drain wait for the next turn
    let remaining = this.size;
    while (remaining > 0 && this.size > 0 && !this.closed) {
      const item = this.shift();
      remaining--;
      if (item === undefined) continue;

      try {
        this.consumer(item);
      } catch (err) {
        this.onError(err);
      }
    }
  }

  private shift(): T | undefined {
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.size--;
    return item;
  }

  /**
   * Drop all pending items and stop accepting new ones
   */
  close(): void {
    this.closed = true;
    this.slots.fill(undefined);
    this.head = 0;
    this.size = 0;
  }

  get length(): number {
    return this.size;
  }

  get droppedCount(): number {
    return this.dropped;
  }
}
