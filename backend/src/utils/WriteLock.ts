/**
 * Single-writer lock for the time-series store.
 *
 * Appends and truncation run one at a time in submission order. Readers never
 * take the lock; stores hand them a snapshot that is either fully before or
 * fully after a truncation.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  public get queueDepth(): number {
    return this.pending;
  }
}
