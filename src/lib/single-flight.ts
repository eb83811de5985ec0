/**
 * Collapses concurrent calls for the same key into one execution.
 * Every caller that arrives while a call is in flight receives that call's promise.
 */
export class SingleFlight<K, V> {
  private inFlight = new Map<K, Promise<V>>();

  run(key: K, fn: () => Promise<V>): Promise<V> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    // fn starts on the next microtask, after the entry is registered
    const promise = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  has(key: K): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
