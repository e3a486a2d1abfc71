/**
 * Promise-chain lock. Callers run strictly one after another in arrival
 * order; a failing callback rejects only its own caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // The chain itself must keep going after a rejection; `run` carries it.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
