/**
 * LRU Cache
 *
 * In-memory cache with recency order, an item cap, and a byte budget
 * measured in the same encoding the persistent variant writes to disk.
 *
 * Every read of an existing key and every write moves that key to the
 * most recently used position and marks the cache dirty. Misses and
 * has()/peek() have no side effects.
 */

import { RecencyStore } from './caching/recency-store.js';
import { resolveCacheLimits, type CacheLimitsInput } from './config.js';
import { KeyNotFoundError } from './errors.js';
import { ConsoleCacheLogger } from './observability/console-logger.js';
import type { ICacheLogger } from './observability/interfaces/cache-logger.js';
import {
  arrayHeaderByteLength,
  cacheKeyId,
  entryByteLength,
  estimateBytes,
} from './persistence/codec.js';
import type { CacheKey, CacheValue } from './types.js';
import { formatBytes } from './utils.js';

export interface LRUCacheOptions extends CacheLimitsInput {
  /**
   * Event sink (default: ConsoleCacheLogger at the resolved logLevel)
   */
  logger?: ICacheLogger;
}

export class LRUCache<K extends CacheKey = CacheKey, V extends CacheValue = CacheValue>
  implements Iterable<[K, V]>
{
  readonly maxItemCount: number;
  readonly maxByteSize: number;
  protected readonly logger: ICacheLogger;
  protected readonly store: RecencyStore<K, V>;
  protected dirty = false;
  private readonly inFlight = new Map<string, Promise<V>>();

  constructor(options: LRUCacheOptions = {}) {
    const { logger, ...limitOptions } = options;
    const limits = resolveCacheLimits(limitOptions);

    this.maxItemCount = limits.maxItemCount;
    this.maxByteSize = limits.maxByteSize;
    this.logger = logger ?? new ConsoleCacheLogger({ level: limits.logLevel });
    this.store = new RecencyStore<K, V>({
      maxItemCount: this.maxItemCount,
      onEvict: (key) => {
        this.dirty = true;
        this.logger.debug({ event: 'evict', key });
      },
    });
  }

  /**
   * True if anything changed since the last load or save
   */
  get isDirty(): boolean {
    return this.dirty;
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Return value for key, promoting it to most recently used
   */
  get(key: K): V | undefined {
    const value = this.store.get(key);
    if (value === undefined) {
      this.logger.debug({ event: 'miss', key });
      return undefined;
    }

    this.logger.debug({ event: 'hit', key });
    this.dirty = true;
    return value;
  }

  /**
   * Return value for key without touching recency
   */
  peek(key: K): V | undefined {
    return this.store.peek(key);
  }

  /**
   * Containment check; never promotes
   */
  has(key: K): boolean {
    return this.store.has(key);
  }

  /**
   * Insert or replace value for key
   */
  set(key: K, value: V): this {
    this.logger.debug({ event: 'set', key });
    this.dirty = true;
    this.store.set(key, value);
    return this;
  }

  /**
   * Remove key
   *
   * @throws {KeyNotFoundError} If key is not in the cache
   */
  delete(key: K): void {
    if (!this.store.delete(key)) {
      throw new KeyNotFoundError(key);
    }
    this.logger.debug({ event: 'delete', key });
    this.dirty = true;
  }

  /**
   * Return cached value for key, or compute it with `loader` and cache it
   *
   * `loader` runs at most once per call and only on a miss. If it throws,
   * the error propagates and nothing is cached.
   */
  getOrLoad(key: K, loader: () => V): V {
    const cached = this.store.get(key);
    if (cached !== undefined) {
      this.logger.debug({ event: 'hit', key });
      this.dirty = true;
      return cached;
    }

    this.logger.debug({ event: 'miss', key });
    const value = loader();
    this.dirty = true;
    this.store.set(key, value);
    return value;
  }

  /**
   * Async variant of getOrLoad()
   *
   * Concurrent calls for the same missing key share one loader call.
   * A rejected load caches nothing; the next call tries again.
   */
  async getOrLoadAsync(key: K, loader: () => Promise<V>): Promise<V> {
    const id = cacheKeyId(key);

    // Check if request already in-flight (prevents duplicate concurrent loads)
    const pending = this.inFlight.get(id);
    if (pending) {
      return pending;
    }

    const cached = this.store.get(key);
    if (cached !== undefined) {
      this.logger.debug({ event: 'hit', key });
      this.dirty = true;
      return cached;
    }

    this.logger.debug({ event: 'miss', key });
    const loadPromise = this.loadAndStore(key, loader);
    this.inFlight.set(id, loadPromise);

    try {
      return await loadPromise;
    } finally {
      this.inFlight.delete(id);
    }
  }

  private async loadAndStore(key: K, loader: () => Promise<V>): Promise<V> {
    const value = await loader();
    this.dirty = true;
    this.store.set(key, value);
    return value;
  }

  /**
   * Remove all entries
   */
  clear(): void {
    this.logger.debug({ event: 'clear' });
    this.dirty = true;
    this.store.clear();
  }

  /**
   * Evict least recently used entries until the encoded size fits
   * maxByteSize
   *
   * The eviction order is fixed by a snapshot taken on entry. Ends with an
   * empty cache if even an empty snapshot exceeds the budget.
   *
   * @returns Number of entries evicted
   */
  trim(): number {
    const snapshot = Array.from(this.store.entries());
    const sizes = snapshot.map(([key, value]) => entryByteLength(key, value));
    let contentBytes = sizes.reduce((total, size) => total + size, 0);
    let count = 0;

    while (count < snapshot.length) {
      const remaining = snapshot.length - count;
      if (arrayHeaderByteLength(remaining) + contentBytes <= this.maxByteSize) {
        break;
      }

      const [key] = snapshot[count];
      this.store.delete(key);
      this.dirty = true;
      contentBytes -= sizes[count];
      count++;
    }

    if (count > 0) {
      this.logger.debug({ event: 'trim', count, message: `trimmed ${count} items` });
    }
    return count;
  }

  /**
   * Encoded size of the current entries in bytes
   */
  byteSize(): number {
    return estimateBytes(this.store.entries());
  }

  /**
   * Keys, least recently used first
   */
  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  /**
   * Values, least recently used first
   */
  values(): IterableIterator<V> {
    return this.store.values();
  }

  /**
   * Entries, least recently used first
   */
  entries(): IterableIterator<[K, V]> {
    return this.store.entries();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store.entries();
  }

  toString(): string {
    return `<${this.constructor.name} ${this.size} items, ${formatBytes(this.byteSize())}>`;
  }
}
