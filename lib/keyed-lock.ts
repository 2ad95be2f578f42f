/**
 * In-process mutual exclusion per key. Work queued under the same key runs one
 * at a time in arrival order; different keys never wait on each other.
 * Coordinates a single process only; cross-instance callers pair it with the
 * row lock in db-lock.ts or an optimistic version check.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(() => task());
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
