/**
 * Single-consumer task queue: tasks run one at a time in push order.
 * `capacity` bounds queued + running tasks; push() returns null when full.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.pending;
  }

  push<T>(task: () => Promise<T>): Promise<T> | null {
    if (this.pending >= this.capacity) return null;
    this.pending++;

    const run = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // a failed task must not stall the ones behind it
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Resolves once nothing is queued or running, including tasks pushed meanwhile. */
  async drain(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }
}
