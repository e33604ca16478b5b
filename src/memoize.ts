/**
 * Function memoization on top of LRUCache.getOrLoad()
 *
 * The cache key of a call is `[namespace, ...args]`, so every argument must
 * itself be a CacheKey. Functions sharing one cache need distinct
 * namespaces; the function's own name is used when none is given.
 */

import type { LRUCache } from './lru-cache.js';
import type { CacheKey, CacheValue } from './types.js';

export interface MemoizeOptions {
  /** First element of every cache key (default: fn.name) */
  namespace?: string;
}

function resolveNamespace(fn: { name: string }, options: MemoizeOptions): string {
  const namespace = options.namespace ?? fn.name;
  if (!namespace) {
    throw new Error('memoize: anonymous functions need an explicit namespace');
  }
  return namespace;
}

/**
 * Wrap a synchronous function so repeat calls are served from `cache`
 *
 * `fn.name` is not stable under bundling or minification (a bundler may
 * rename `function square` to `square2`), so caches persisted across builds
 * should pass `namespace`.
 *
 * @example
 * ```typescript
 * const cache = openCache('.cache/slow.msgpack');
 * const slowSquare = memoize(cache, (n: number) => n * n, { namespace: 'square' });
 * ```
 */
export function memoize<A extends CacheKey[], V extends CacheValue>(
  cache: LRUCache<CacheKey, V>,
  fn: (...args: A) => V,
  options: MemoizeOptions = {}
): (...args: A) => V {
  const namespace = resolveNamespace(fn, options);
  return (...args: A) => cache.getOrLoad([namespace, ...args], () => fn(...args));
}

/**
 * Wrap an async function; concurrent calls with equal arguments share one
 * underlying call
 */
export function memoizeAsync<A extends CacheKey[], V extends CacheValue>(
  cache: LRUCache<CacheKey, V>,
  fn: (...args: A) => Promise<V>,
  options: MemoizeOptions = {}
): (...args: A) => Promise<V> {
  const namespace = resolveNamespace(fn, options);
  return (...args: A) => cache.getOrLoadAsync([namespace, ...args], () => fn(...args));
}
