/**
 * Cache Codec
 *
 * One encoding serves three purposes: the on-disk snapshot, the size
 * estimate that trim() compares against maxByteSize, and key identity.
 * Keeping them on the same MessagePack encoder means the estimate and the
 * size of the file that save() writes always agree.
 *
 * Snapshot layout: a single MessagePack array of `[key, value]` pairs,
 * least recently used first.
 *
 * MessagePack is concatenative, so the encoded size of a list is the array
 * header plus the sum of the encoded pairs. trim() relies on that to avoid
 * re-encoding the whole store after every eviction.
 */

import { decode, encode } from '@msgpack/msgpack';
import { z } from 'zod';
import type { CacheKey, CacheSchema, CacheValue } from '../types.js';

export type CacheRecord<K extends CacheKey, V extends CacheValue> = readonly [K, V];

const RecordListSchema = z.array(z.tuple([z.unknown(), z.unknown()]));

/**
 * Canonical identity of a key
 *
 * Two keys map to the same id exactly when their encodings match, which
 * gives tuple keys value semantics that a JavaScript Map does not.
 */
export function cacheKeyId(key: CacheKey): string {
  return Buffer.from(encode(key)).toString('base64');
}

/**
 * Encode an ordered entry list into a snapshot
 */
export function encodeEntries<K extends CacheKey, V extends CacheValue>(
  entries: Iterable<CacheRecord<K, V>>
): Uint8Array {
  return encode(Array.from(entries));
}

/**
 * Serialized size of an entry list in bytes
 *
 * Re-encodes every entry: O(total content size).
 */
export function estimateBytes<K extends CacheKey, V extends CacheValue>(
  entries: Iterable<CacheRecord<K, V>>
): number {
  return encodeEntries(entries).byteLength;
}

/**
 * Encoded size of a single `[key, value]` pair inside a snapshot
 */
export function entryByteLength(key: CacheKey, value: CacheValue): number {
  return encode([key, value]).byteLength;
}

/**
 * Size of the MessagePack array header for `count` elements
 * (fixarray, array 16, array 32)
 */
export function arrayHeaderByteLength(count: number): number {
  if (count < 16) {
    return 1;
  }
  if (count < 0x10000) {
    return 3;
  }
  return 5;
}

/**
 * Decode a snapshot, validating every key and value
 *
 * @throws {Error} If the bytes are not a MessagePack list of pairs, or a
 *   pair fails its schema. Callers attach the file path.
 */
export function decodeEntries<K extends CacheKey, V extends CacheValue>(
  bytes: Uint8Array,
  keySchema: CacheSchema<K>,
  valueSchema: CacheSchema<V>
): Array<CacheRecord<K, V>> {
  const records = RecordListSchema.parse(decode(bytes));

  return records.map(([rawKey, rawValue], index): CacheRecord<K, V> => {
    const key = keySchema.safeParse(rawKey);
    if (!key.success) {
      throw new Error(`invalid key in record ${index}: ${key.error.message}`, { cause: key.error });
    }

    const value = valueSchema.safeParse(rawValue);
    if (!value.success) {
      throw new Error(`invalid value in record ${index}: ${value.error.message}`, { cause: value.error });
    }

    return [key.data, value.data];
  });
}
