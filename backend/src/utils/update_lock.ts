/**
 * Runs tasks one at a time, in the order they were queued. A rejected task
 * releases the lock the same way a resolved one does.
 */
export class UpdateLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
