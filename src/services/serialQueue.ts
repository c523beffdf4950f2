/**
 * Runs tasks one at a time in submission order. A rejected task is reported to
 * its own caller only; the queue moves on to the next task.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private inFlight = 0;

  /** Tasks submitted and not yet settled, including the running one. */
  get pending(): number {
    return this.inFlight;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.inFlight++;
    const result = this.tail.then(task).finally(() => {
      this.inFlight--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
