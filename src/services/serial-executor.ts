/**
 * Runs mutating flows one at a time, in arrival order. A failed flow does not
 * block the ones queued behind it.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  get queued(): number {
    return this.pending;
  }

  private release(): void {
    this.pending -= 1;
  }
}
