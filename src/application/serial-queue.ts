/**
 * Runs tasks one at a time in submission order. Used as the single owner of
 * shared state (risk counters) and to serialize lifecycle transitions per symbol.
 * A failed task rejects its own promise only; the queue keeps going.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; },
    );
    return result;
  }

  get size(): number { return this.pending; }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> { return this.tail; }
}
