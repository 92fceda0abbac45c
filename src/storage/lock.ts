/** Runs tasks one at a time, in the order they were submitted. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task);
    // The queue only tracks completion; the caller receives the outcome.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
