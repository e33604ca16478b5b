/**
 * Recency Store
 *
 * Implements ICacheProvider on top of the lru-cache library, which gives
 * O(1) lookup, insert, delete and move-to-most-recent.
 *
 * Key Features:
 * - Structural keys: entries are indexed by cacheKeyId(), and the caller's
 *   key is kept beside the value for iteration and persistence
 * - Item cap: inserts past maxItemCount evict the least recently used entry
 * - No byte bound here; that is LRUCache.trim()'s job
 */

import { LRUCache } from 'lru-cache';
import type { ICacheProvider } from './cache-provider.js';
import { cacheKeyId } from '../persistence/codec.js';
import type { CacheKey, CacheValue } from '../types.js';

interface Slot<K, V> {
  key: K;
  value: V;
}

export interface RecencyStoreOptions<K> {
  /**
   * Maximum number of entries
   * Counted through lru-cache's maxSize so that no slot arrays are
   * preallocated for the default (unbounded) cap
   */
  maxItemCount: number;

  /**
   * Called for each entry pushed out by the item cap
   */
  onEvict?: (key: K) => void;
}

export class RecencyStore<K extends CacheKey, V extends CacheValue> implements ICacheProvider<K, V> {
  private readonly store: LRUCache<string, Slot<K, V>>;

  constructor(options: RecencyStoreOptions<K>) {
    if (!Number.isSafeInteger(options.maxItemCount) || options.maxItemCount <= 0) {
      throw new Error('maxItemCount must be a positive integer');
    }

    const onEvict = options.onEvict;
    this.store = new LRUCache<string, Slot<K, V>>({
      maxSize: options.maxItemCount,
      sizeCalculation: () => 1,
      dispose: onEvict
        ? (slot, _id, reason) => {
            // 'set' and 'delete' are replacements and explicit removals
            if (reason === 'evict') {
              onEvict(slot.key);
            }
          }
        : undefined,
    });
  }

  get(key: K): V | undefined {
    return this.store.get(cacheKeyId(key))?.value;
  }

  peek(key: K): V | undefined {
    return this.store.peek(cacheKeyId(key))?.value;
  }

  has(key: K): boolean {
    return this.store.has(cacheKeyId(key));
  }

  set(key: K, value: V): void {
    this.store.set(cacheKeyId(key), { key, value });
  }

  delete(key: K): boolean {
    return this.store.delete(cacheKeyId(key));
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  *keys(): IterableIterator<K> {
    for (const slot of this.slots()) {
      yield slot.key;
    }
  }

  *values(): IterableIterator<V> {
    for (const slot of this.slots()) {
      yield slot.value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const slot of this.slots()) {
      yield [slot.key, slot.value];
    }
  }

  /**
   * Slots least recently used first; peek() leaves the order untouched
   */
  private *slots(): Generator<Slot<K, V>> {
    for (const id of this.store.rkeys()) {
      const slot = this.store.peek(id);
      if (slot !== undefined) {
        yield slot;
      }
    }
  }
}
