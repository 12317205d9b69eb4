/**
 * Bounded least-recently-used map. Insertion order of the underlying `Map` tracks recency.
 */
export class MatchCache<V> {
  private readonly store = new Map<string, V>();

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.store.size;
  }

  get(key: string): V | undefined {
    const value = this.store.get(key);

    if (value !== undefined) {
      this.store.delete(key);
      this.store.set(key, value);
    }

    return value;
  }

  set(key: string, value: V): void {
    this.store.delete(key);
    this.store.set(key, value);

    if (this.store.size > this.capacity) {
      const oldest = this.store.keys().next();

      if (oldest.done !== true) {
        this.store.delete(oldest.value);
      }
    }
  }
}
