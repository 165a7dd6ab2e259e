/**
 * Module: Keyed Mutex
 * Purpose: Serialize async work per key through a promise chain. Work on
 * different keys runs independently; a failed task releases the key.
 */
export class KeyedMutex {
  private readonly chains = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.chains.get(key) ?? Promise.resolve();
    const tail = previous.then(() => gate);
    this.chains.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.chains.get(key) === tail) this.chains.delete(key);
    }
  }
}
