/**
 * Cache Provider Interface
 *
 * Ordered key/value storage where insertion order doubles as recency
 * order. Iteration runs least recently used first, so the head of
 * `keys()` is the next eviction candidate.
 */

export interface ICacheProvider<K, V> {
  /**
   * Get value and promote key to most recently used
   */
  get(key: K): V | undefined;

  /**
   * Get value without touching recency
   */
  peek(key: K): V | undefined;

  /**
   * Check if key exists (never promotes)
   */
  has(key: K): boolean;

  /**
   * Insert or replace, promoting key to most recently used
   */
  set(key: K, value: V): void;

  /**
   * Delete key; false if it was absent
   */
  delete(key: K): boolean;

  /**
   * Clear entire store
   */
  clear(): void;

  /**
   * Number of entries
   */
  get size(): number;

  keys(): IterableIterator<K>;
  values(): IterableIterator<V>;
  entries(): IterableIterator<[K, V]>;
}
