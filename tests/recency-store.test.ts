import { describe, it, expect, vi } from 'vitest';
import { RecencyStore } from '../src/caching/recency-store.js';
import type { CacheKey } from '../src/types.js';

describe('RecencyStore', () => {
  const unbounded = { maxItemCount: Number.MAX_SAFE_INTEGER };

  describe('ordering', () => {
    it('should_iterateOldestFirst_when_keysInsertedInOrder', () => {
      const store = new RecencyStore<string, number>(unbounded);
      store.set('a', 1);
      store.set('b', 2);
      store.set('c', 3);

      expect(Array.from(store.keys())).toEqual(['a', 'b', 'c']);
      expect(Array.from(store.values())).toEqual([1, 2, 3]);
      expect(Array.from(store.entries())).toEqual([['a', 1], ['b', 2], ['c', 3]]);
    });

    it('should_promoteKey_when_get', () => {
      const store = new RecencyStore<string, number>(unbounded);
      store.set('a', 1);
      store.set('b', 2);
      store.set('c', 3);

      expect(store.get('a')).toBe(1);
      expect(Array.from(store.keys())).toEqual(['b', 'c', 'a']);
    });

    it('should_promoteKey_when_setReplacesValue', () => {
      const store = new RecencyStore<string, number>(unbounded);
      store.set('a', 1);
      store.set('b', 2);
      store.set('a', 10);

      expect(Array.from(store.entries())).toEqual([['b', 2], ['a', 10]]);
    });

    it('should_notPromote_when_hasOrPeek', () => {
      const store = new RecencyStore<string, number>(unbounded);
      store.set('a', 1);
      store.set('b', 2);

      expect(store.has('a')).toBe(true);
      expect(store.peek('a')).toBe(1);
      expect(Array.from(store.keys())).toEqual(['a', 'b']);
    });

    it('should_keepOrder_when_iteratedRepeatedly', () => {
      const store = new RecencyStore<string, number>(unbounded);
      store.set('a', 1);
      store.set('b', 2);
      store.set('c', 3);

      expect(Array.from(store.values())).toEqual([1, 2, 3]);
      expect(Array.from(store.entries())).toEqual([['a', 1], ['b', 2], ['c', 3]]);
      expect(Array.from(store.keys())).toEqual(['a', 'b', 'c']);
    });
  });

  describe('structural keys', () => {
    it('should_treatEqualTuples_as_sameKey', () => {
      const store = new RecencyStore<CacheKey, string>(unbounded);
      store.set(['fetch', 'https://example.test', 1], 'body');

      expect(store.get(['fetch', 'https://example.test', 1])).toBe('body');
      expect(store.size).toBe(1);
    });

    it('should_distinguishNumber_from_numericString', () => {
      const store = new RecencyStore<CacheKey, string>(unbounded);
      store.set(1, 'number');
      store.set('1', 'string');

      expect(store.size).toBe(2);
      expect(store.get(1)).toBe('number');
      expect(store.get('1')).toBe('string');
    });

    it('should_returnOriginalKeys_when_iterating', () => {
      const store = new RecencyStore<CacheKey, number>(unbounded);
      store.set(['a', [1, 2]], 1);
      store.set(null, 2);

      expect(Array.from(store.keys())).toEqual([['a', [1, 2]], null]);
    });
  });

  describe('delete and clear', () => {
    it('should_returnFalse_when_deletingAbsentKey', () => {
      const store = new RecencyStore<string, number>(unbounded);
      store.set('a', 1);

      expect(store.delete('missing')).toBe(false);
      expect(store.delete('a')).toBe(true);
      expect(store.size).toBe(0);
    });

    it('should_notReportEviction_when_deletedOrCleared', () => {
      const onEvict = vi.fn();
      const store = new RecencyStore<string, number>({ maxItemCount: 10, onEvict });
      store.set('a', 1);
      store.set('a', 2);
      store.set('b', 3);
      store.delete('a');
      store.clear();

      expect(onEvict).not.toHaveBeenCalled();
      expect(store.size).toBe(0);
    });
  });

  describe('item cap', () => {
    it('should_evictLeastRecent_when_capExceeded', () => {
      const onEvict = vi.fn();
      const store = new RecencyStore<string, number>({ maxItemCount: 2, onEvict });
      store.set('a', 1);
      store.set('b', 2);
      store.get('a');
      store.set('c', 3);

      expect(Array.from(store.keys())).toEqual(['a', 'c']);
      expect(onEvict).toHaveBeenCalledTimes(1);
      expect(onEvict).toHaveBeenCalledWith('b');
    });

    it('should_rejectInvalidCap', () => {
      expect(() => new RecencyStore({ maxItemCount: 0 })).toThrow('maxItemCount must be a positive integer');
      expect(() => new RecencyStore({ maxItemCount: 1.5 })).toThrow('maxItemCount must be a positive integer');
    });
  });
});
