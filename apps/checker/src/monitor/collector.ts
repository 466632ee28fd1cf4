/**
 * Holds the results of one batch while its probes run.
 *
 * Capacity is fixed to the number of probes, so a producer never waits on the
 * consumer. Draining is only possible after `close()`, i.e. after every probe
 * has settled; a short or overfull collector is a bug and throws.
 */
export class ResultCollector<T> {
  private readonly items: T[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Invalid collector capacity: ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push into a closed collector');
    }
    if (this.items.length >= this.capacity) {
      throw new Error(`Collector is full (capacity ${this.capacity})`);
    }
    this.items.push(item);
  }

  close(): void {
    this.closed = true;
  }

  drain(): T[] {
    if (!this.closed) {
      throw new Error('Cannot drain an open collector');
    }
    if (this.items.length !== this.capacity) {
      throw new Error(`Collector holds ${this.items.length} of ${this.capacity} expected items`);
    }
    return this.items.splice(0, this.items.length);
  }
}
