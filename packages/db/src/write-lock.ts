/**
 * Per-store write serialization.
 *
 * Every mutation on a store instance runs through `run()`, so writes are
 * linearized in submission order. Reads never take the lock.
 *
 * A failed task does not poison the chain; the next task still runs.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }
}
