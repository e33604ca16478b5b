import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { withCache, withCacheAsync } from '../src/scoped.js';
import { openCache } from '../src/persistent-lru-cache.js';
import { RecordingLogger } from './helpers/recording-logger.js';

describe('withCache', () => {
  it('should_closeAfterReturn', () => {
    const cache = { close: vi.fn() };

    expect(withCache(cache, () => 'result')).toBe('result');
    expect(cache.close).toHaveBeenCalledTimes(1);
  });

  it('should_closeAfterThrow', () => {
    const cache = { close: vi.fn() };

    expect(() =>
      withCache(cache, () => {
        throw new Error('loader failed');
      })
    ).toThrow('loader failed');
    expect(cache.close).toHaveBeenCalledTimes(1);
  });
});

describe('withCacheAsync', () => {
  it('should_closeAfterResolve', async () => {
    const cache = { close: vi.fn() };

    await expect(withCacheAsync(cache, async () => 7)).resolves.toBe(7);
    expect(cache.close).toHaveBeenCalledTimes(1);
  });

  it('should_closeAfterReject', async () => {
    const cache = { close: vi.fn() };

    await expect(
      withCacheAsync(cache, async () => {
        throw new Error('network down');
      })
    ).rejects.toThrow('network down');
    expect(cache.close).toHaveBeenCalledTimes(1);
  });
});

describe('withCache + PersistentLRUCache', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lru-cache-scoped-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should_persistChanges_made_inScope', () => {
    const cachePath = path.join(tempDir, 'scoped.msgpack');
    const logger = new RecordingLogger();

    withCache(openCache(cachePath, { autoSaveOnExit: false, logger }), (cache) => {
      cache.set('greeting', 'hello');
    });

    const reopened = openCache(cachePath, { autoSaveOnExit: false, logger });
    expect(reopened.get('greeting')).toBe('hello');
  });
});
