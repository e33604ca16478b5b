/**
 * Persistent LRU Cache
 *
 * LRUCache that loads its entries from a snapshot file at construction and
 * writes them back on save()/close(). Saving trims to maxByteSize first, so
 * the file never exceeds the budget (unless the budget is below the size
 * of an empty snapshot).
 *
 * Unless autoSaveOnExit is false, the cache joins the process-wide exit
 * registry and is closed automatically when the process exits normally.
 * The registry holds it weakly and never keeps it alive.
 *
 * USAGE:
 * ```typescript
 * const cache = new PersistentLRUCache({
 *   path: path.join(os.homedir(), '.cache', 'geocode.msgpack'),
 *   keySchema: z.string(),
 *   valueSchema: z.object({ lat: z.number(), lon: z.number() }),
 *   maxByteSize: 16 * 1024 * 1024,
 * });
 *
 * const point = await cache.getOrLoadAsync(address, () => geocode(address));
 * ```
 */

import { exitFlushRegistry } from './exit-flush-registry.js';
import { CacheDeserializationError } from './errors.js';
import { LRUCache, type LRUCacheOptions } from './lru-cache.js';
import { decodeEntries, encodeEntries, type CacheRecord } from './persistence/codec.js';
import { readSnapshot, writeSnapshot } from './persistence/snapshot-file.js';
import {
  cacheKeySchema,
  cacheValueSchema,
  type CacheKey,
  type CacheSchema,
  type CacheValue,
} from './types.js';
import { normalizeError } from './utils.js';

export interface PersistentLRUCacheOptions<K extends CacheKey, V extends CacheValue> extends LRUCacheOptions {
  /**
   * Snapshot file; without one the cache lives in memory only and save()
   * reports an error instead of writing
   */
  path?: string;

  /** Validates keys read from the snapshot */
  keySchema: CacheSchema<K>;

  /** Validates values read from the snapshot */
  valueSchema: CacheSchema<V>;

  /**
   * Close automatically on process exit (default: true)
   * Only applies when `path` is set
   */
  autoSaveOnExit?: boolean;
}

export class PersistentLRUCache<K extends CacheKey = CacheKey, V extends CacheValue = CacheValue>
  extends LRUCache<K, V>
{
  readonly path: string | undefined;
  private readonly keySchema: CacheSchema<K>;
  private readonly valueSchema: CacheSchema<V>;

  /**
   * @throws {CacheDeserializationError} If the snapshot exists but cannot be
   *   read or decoded
   */
  constructor(options: PersistentLRUCacheOptions<K, V>) {
    const { path, keySchema, valueSchema, autoSaveOnExit = true, ...cacheOptions } = options;
    super(cacheOptions);

    this.path = path;
    this.keySchema = keySchema;
    this.valueSchema = valueSchema;

    this.load();

    if (autoSaveOnExit && this.path !== undefined) {
      exitFlushRegistry.register(this);
    }
  }

  /**
   * Replace the in-memory entries with the snapshot's
   *
   * A missing path or missing file leaves the cache empty. Entries keep the
   * file's order as their recency order.
   */
  load(): void {
    this.store.clear();
    this.dirty = false;

    if (this.path === undefined) {
      return;
    }

    const bytes = readSnapshot(this.path);
    if (bytes === undefined) {
      this.logger.debug({ event: 'load', path: this.path, count: 0, message: 'persisted cache not found' });
      return;
    }

    let records: Array<CacheRecord<K, V>>;
    try {
      records = decodeEntries(bytes, this.keySchema, this.valueSchema);
    } catch (error) {
      const err = normalizeError(error);
      throw new CacheDeserializationError(this.path, err.message, { cause: error });
    }

    for (const [key, value] of records) {
      this.store.set(key, value);
    }

    // Entries dropped by the item cap while loading diverge from the file
    this.dirty = this.store.size < records.length;
    this.logger.debug({ event: 'load', path: this.path, count: this.store.size });
  }

  /**
   * Trim and write the cache to its snapshot file
   *
   * @returns true if the file was written; false when there is no path or
   *   nothing changed since the last load/save
   */
  save(): boolean {
    if (this.path === undefined) {
      this.logger.error({ event: 'save_failed', message: 'no backing path configured' });
      return false;
    }

    if (!this.dirty) {
      this.logger.info({ event: 'save_skipped', path: this.path, message: 'no changes to save' });
      return false;
    }

    this.trim();
    const bytes = encodeEntries(this.store.entries());
    writeSnapshot(this.path, bytes);
    this.dirty = false;

    this.logger.debug({ event: 'save', path: this.path, count: this.store.size, bytes: bytes.byteLength });
    return true;
  }

  /**
   * Terminal lifecycle operation; same as save()
   */
  close(): boolean {
    return this.save();
  }
}

/**
 * Open a persistent cache over any CacheKey/CacheValue
 *
 * @example
 * ```typescript
 * const cache = openCache('.cache/responses.msgpack', { maxByteSize: 1024 * 1024 });
 * ```
 */
export function openCache(
  path: string,
  options: Omit<PersistentLRUCacheOptions<CacheKey, CacheValue>, 'path' | 'keySchema' | 'valueSchema'> = {}
): PersistentLRUCache<CacheKey, CacheValue> {
  return new PersistentLRUCache({
    ...options,
    path,
    keySchema: cacheKeySchema,
    valueSchema: cacheValueSchema,
  });
}
