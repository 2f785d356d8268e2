/**
 * Per-key serialization and revision stamping for the reconciler intake
 */

/**
 * Runs tasks for the same key one after another, in submission order.
 * Tasks for different keys run independently.
 */
export class KeyedSerialExecutor {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain must survive a failed task
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Keys with queued or running work */
  get pendingKeys(): number {
    return this.tails.size;
  }

  /** Resolves once everything submitted so far has settled */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }
}

/**
 * Wall-clock revisions (ms) that never repeat or go backwards for one source
 *
 * @example
 * const clock = new RevisionClock();
 * const revision = clock.next(); // Date.now(), or last + 1 if the clock stood still
 */
export class RevisionClock {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): number {
    this.last = Math.max(this.now(), this.last + 1);
    return this.last;
  }

  /** Ensure the next revision is above `revision` */
  advancePast(revision: number): void {
    this.last = Math.max(this.last, revision);
  }
}
