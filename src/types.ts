/**
 * Type definitions for persistent-lru-cache
 */

import { z } from 'zod';

// ============================================================================
// KEYS AND VALUES
// ============================================================================

/**
 * Cache key
 *
 * Keys compare structurally: two keys are the same entry when their
 * MessagePack encodings are byte-identical. `['fetch', 1]` built twice is one
 * key; `1` and `'1'` are two.
 */
export type CacheKey = string | number | boolean | null | readonly CacheKey[];

/**
 * Cache value
 *
 * Values the on-disk encoding reads back unchanged, except `-0`, which is
 * written as an integer and reads back as `0`. `undefined` is excluded
 * because it is indistinguishable from a miss.
 */
export type CacheValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | readonly CacheValue[]
  | { readonly [field: string]: CacheValue };

/**
 * Validates keys read back from a backing file
 */
export const cacheKeySchema: z.ZodType<CacheKey> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(cacheKeySchema),
  ])
);

/**
 * Validates values read back from a backing file
 */
export const cacheValueSchema: z.ZodType<CacheValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.instanceof(Uint8Array),
    z.array(cacheValueSchema),
    z.record(z.string(), cacheValueSchema),
  ])
);

/**
 * Zod schema accepted for typed keys/values (input side left open so that
 * schemas with transforms or coercion also fit)
 */
export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// LIFECYCLE
// ============================================================================

/**
 * Anything the exit registry or scoped helpers can close
 */
export interface Closable {
  close(): unknown;
}
