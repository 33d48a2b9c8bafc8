/**
 * Mutual-exclusion section for async operations
 *
 * Each call to runExclusive is one unit: the whole callback (a read-then-write
 * sequence, for example) completes before the next queued callback starts.
 * A failed operation releases the lock for the next caller.
 */
export class OperationLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    this.queued++;
    const result = this.tail.then(() => operation());
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  /**
   * Number of operations waiting or running
   */
  get pending(): number {
    return this.queued;
  }

  private release(): void {
    this.queued--;
  }
}
