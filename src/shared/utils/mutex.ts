/**
 * Promise-chain mutex. Callers queue in arrival order; a rejected task
 * releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(() => task());
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  private release(): void {
    this.pending--;
  }
}
