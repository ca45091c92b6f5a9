/**
 * Per-target mutual exclusion.
 *
 * A promise chain: each `run` waits for every earlier holder to settle
 * before its own function starts. One lock exists per target, owned by that
 * target's generation store.
 */

export class TargetLock {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  constructor(public readonly targetId: string) {}

  /** Run `fn` once every earlier holder has finished. */
  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(async () => {
      this.held++;
      try {
        return await fn();
      } finally {
        this.held--;
      }
    });
    // The chain must keep going after a failed holder.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Whether some holder is currently running. */
  get locked(): boolean {
    return this.held > 0;
  }
}
