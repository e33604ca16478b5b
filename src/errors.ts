/**
 * Error classes raised by the cache
 *
 * Only two conditions are recovered internally (saving without a backing
 * path, saving with nothing to write); everything below reaches the caller.
 */

import type { CacheKey } from './types.js';

export enum CacheErrorType {
  NOT_FOUND = 'not_found',
  DESERIALIZATION = 'deserialization',
}

/**
 * Base class for all cache errors
 */
export class CacheError extends Error {
  constructor(
    message: string,
    readonly errorType: CacheErrorType,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CacheError';
  }
}

/**
 * Raised by `delete` for a key that is not in the cache
 */
export class KeyNotFoundError extends CacheError {
  constructor(readonly key: CacheKey) {
    super(`Key not found: ${JSON.stringify(key)}`, CacheErrorType.NOT_FOUND);
    this.name = 'KeyNotFoundError';
  }
}

/**
 * Raised when a backing file cannot be read or decoded into entries.
 * The underlying failure is kept as `cause`.
 */
export class CacheDeserializationError extends CacheError {
  constructor(readonly path: string, detail: string, options?: ErrorOptions) {
    super(
      `Failed to load cache from ${path}: ${detail}`,
      CacheErrorType.DESERIALIZATION,
      options
    );
    this.name = 'CacheDeserializationError';
  }
}
