/**
 * Per-connection outbound queue backed by a growable ring buffer.
 *
 * O(1) push and shift. Droppable items (pubsub deliveries) are refused once
 * the queue holds `capacity` items; every other item is queued regardless,
 * growing the buffer.
 */
export class Outbox<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;
  private limit: number;

  constructor(capacity: number) {
    this.limit = validateCapacity(capacity);
    this.buffer = new Array<T | undefined>(capacity);
  }

  /**
   * Queue an item. Returns false when a droppable item is refused because
   * the queue is at capacity.
   */
  push(item: T, droppable: boolean): boolean {
    if (droppable && this.count >= this.limit) {
      return false;
    }
    if (this.count === this.buffer.length) {
      this.grow();
    }
    this.buffer[(this.head + this.count) % this.buffer.length] = item;
    this.count++;
    return true;
  }

  /**
   * Remove and return the oldest item, or undefined if empty.
   */
  shift(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;
    return item;
  }

  peek(): T | undefined {
    return this.count === 0 ? undefined : this.buffer[this.head];
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.limit);
    this.head = 0;
    this.count = 0;
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  get capacity(): number {
    return this.limit;
  }

  /** Items already queued beyond a lowered capacity stay queued. */
  set capacity(value: number) {
    this.limit = validateCapacity(value);
  }

  private grow(): void {
    const next = new Array<T | undefined>(Math.max(1, this.buffer.length * 2));
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    this.buffer = next;
    this.head = 0;
  }
}

function validateCapacity(capacity: number): number {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Outbox capacity must be a positive integer, got ${capacity}`);
  }
  return capacity;
}
