/**
 * Fixed-capacity circular buffer with an index cursor. Pushing into a full
 * buffer overwrites the oldest element and returns it.
 */
export class RingBuffer<T> {
  private readonly items: Array<T | undefined>;
  private head = 0; // next write position
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    this.items = new Array<T | undefined>(capacity);
  }

  get length(): number { return this.count; }
  isFull(): boolean { return this.count === this.capacity; }

  push(value: T): T | undefined {
    const evicted = this.count === this.capacity ? this.items[this.head] : undefined;
    this.items[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
    return evicted;
  }

  /** Element by age: 0 is the oldest retained element. */
  at(index: number): T | undefined {
    if (index < 0 || index >= this.count) return undefined;
    const start = (this.head - this.count + this.capacity) % this.capacity;
    return this.items[(start + index) % this.capacity];
  }

  last(): T | undefined { return this.at(this.count - 1); }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const v = this.at(i);
      if (v !== undefined) out.push(v);
    }
    return out;
  }

  /** The newest `n` elements, oldest first. */
  tail(n: number): T[] {
    const all = this.toArray();
    return n >= all.length ? all : all.slice(all.length - n);
  }

  clear() {
    this.items.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
