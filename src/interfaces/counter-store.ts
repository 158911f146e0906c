/** Key prefix for counts of real traffic. */
export const NAMESPACE_REAL = "url_count";
/** Key prefix for counts of synthetic traffic; also the marker header's value. */
export const NAMESPACE_TEST = "test";

export type CounterNamespace = typeof NAMESPACE_REAL | typeof NAMESPACE_TEST;

export interface UrlCount {
  url: string;
  count: number;
}

/**
 * Per-path request counters, partitioned by namespace.
 * Implementations report failures as CounterStoreError.
 */
export interface CounterStore {
  increment(path: string, namespace: CounterNamespace): Promise<number>;
  /** Delete every counter in the namespace; resolves with the number removed. */
  clearNamespace(namespace: CounterNamespace): Promise<number>;
  /** Counts in the namespace, highest first. */
  stats(namespace: CounterNamespace): Promise<UrlCount[]>;
  ping(): Promise<void>;
}
