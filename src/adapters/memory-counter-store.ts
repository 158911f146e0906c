import type { CounterNamespace, CounterStore, UrlCount } from "../interfaces/counter-store.js";

/**
 * In-process counter store.
 * Keys are `<namespace>:<path>`; Map insertion order breaks ties in stats().
 */
export class MemoryCounterStore implements CounterStore {
  private counts = new Map<string, number>();

  async increment(path: string, namespace: CounterNamespace): Promise<number> {
    const key = `${namespace}:${path}`;
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }

  async clearNamespace(namespace: CounterNamespace): Promise<number> {
    let removed = 0;
    for (const key of [...this.counts.keys()]) {
      if (key.startsWith(`${namespace}:`)) {
        this.counts.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async stats(namespace: CounterNamespace): Promise<UrlCount[]> {
    const prefix = `${namespace}:`;
    const entries: UrlCount[] = [];
    for (const [key, count] of this.counts) {
      if (key.startsWith(prefix)) entries.push({ url: key.slice(prefix.length), count });
    }
    // Array.prototype.sort is stable
    return entries.sort((a, b) => b.count - a.count);
  }

  async ping(): Promise<void> {}

  /** For testing: number of keys across all namespaces. */
  get size(): number {
    return this.counts.size;
  }
}
