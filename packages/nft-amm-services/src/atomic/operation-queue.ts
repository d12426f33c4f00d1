/**
 * Operation Queue
 *
 * Serializes asynchronous operations so that each one observes the state left
 * by the previous one and never interleaves with another at an await point.
 *
 * Usage:
 * ```typescript
 * const queue = new OperationQueue();
 *
 * // Runs strictly one after the other, in call order
 * const [a, b] = await Promise.all([
 *   queue.run(() => factory.doCreate(...)),
 *   queue.run(() => factory.doDeposit(...)),
 * ]);
 * ```
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingOperations = 0;

  run<T>(operation: () => Promise<T>): Promise<T> {
    this.pendingOperations++;

    const result = this.tail.then(operation).finally(() => {
      this.pendingOperations--;
    });

    // The caller observes failures through `result`; the chain only needs to settle
    this.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }

  /**
   * Operations queued or running
   */
  get pendingCount(): number {
    return this.pendingOperations;
  }
}
