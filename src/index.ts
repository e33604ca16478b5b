/**
 * persistent-lru-cache
 *
 * Disk-backed LRU cache for memoizing expensive computations across
 * process runs.
 */

export { LRUCache, type LRUCacheOptions } from './lru-cache.js';
export {
  PersistentLRUCache,
  openCache,
  type PersistentLRUCacheOptions,
} from './persistent-lru-cache.js';
export {
  ExitFlushRegistry,
  exitFlushRegistry,
  type ExitFlushRegistryOptions,
  type FlushSignal,
} from './exit-flush-registry.js';
export { memoize, memoizeAsync, type MemoizeOptions } from './memoize.js';
export { withCache, withCacheAsync } from './scoped.js';
export {
  CacheError,
  CacheErrorType,
  KeyNotFoundError,
  CacheDeserializationError,
} from './errors.js';
export {
  DEFAULT_MAX_BYTE_SIZE,
  DEFAULT_MAX_ITEM_COUNT,
  DEFAULT_LOG_LEVEL,
  CacheLimitsSchema,
  resolveCacheLimits,
  resolveLogLevel,
  type CacheLimits,
  type CacheLimitsInput,
} from './config.js';
export { ConsoleCacheLogger, type ConsoleCacheLoggerOptions } from './observability/console-logger.js';
export type {
  CacheEventName,
  CacheLogEvent,
  CacheLogLevel,
  ICacheLogger,
} from './observability/interfaces/cache-logger.js';
export {
  estimateBytes,
  entryByteLength,
  arrayHeaderByteLength,
  type CacheRecord,
} from './persistence/codec.js';
export {
  cacheKeySchema,
  cacheValueSchema,
  type CacheKey,
  type CacheValue,
  type CacheSchema,
  type Closable,
} from './types.js';
