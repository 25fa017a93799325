/**
 * Holdgate KeyedLock
 * Serializes async work per key. Work for different keys never waits on each other.
 */

export class KeyedLock {
  private chains = new Map<string, Promise<void>>();

  run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const op = previous.then(work);
    // The chain only tracks completion; the caller still receives op's rejection
    const tail = op.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(key, tail);
    void tail.then(() => {
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    });
    return op;
  }

  /** Keys with work queued or running */
  get size(): number {
    return this.chains.size;
  }
}
