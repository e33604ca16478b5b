/**
 * Scoped cache usage: acquire, use, and close on every exit path
 * (return, early return, or throw).
 */

import type { Closable } from './types.js';

/**
 * Run `fn` with `cache` and close the cache afterwards
 *
 * @example
 * ```typescript
 * const total = withCache(openCache('.cache/prices.msgpack'), (cache) =>
 *   skus.reduce((sum, sku) => sum + Number(cache.getOrLoad(sku, () => lookup(sku))), 0)
 * );
 * ```
 */
export function withCache<C extends Closable, R>(cache: C, fn: (cache: C) => R): R {
  try {
    return fn(cache);
  } finally {
    cache.close();
  }
}

/**
 * Async variant of withCache(): the cache is closed once `fn` settles
 */
export async function withCacheAsync<C extends Closable, R>(
  cache: C,
  fn: (cache: C) => Promise<R>
): Promise<R> {
  try {
    return await fn(cache);
  } finally {
    cache.close();
  }
}
