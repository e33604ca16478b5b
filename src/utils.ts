/**
 * Utility functions for persistent-lru-cache
 */

/**
 * Type guard to check if value is an Error instance
 *
 * @example
 * ```typescript
 * catch (error: unknown) {
 *   if (isError(error)) {
 *     console.error(error.message);
 *   }
 * }
 * ```
 */
export function isError(e: unknown): e is Error {
  return e instanceof Error;
}

/**
 * Type guard for Node.js file system errors, which carry a string `code`
 * such as 'ENOENT'
 *
 * @example
 * ```typescript
 * catch (error: unknown) {
 *   if (isErrnoException(error) && error.code === 'ENOENT') {
 *     // Missing file
 *   }
 * }
 * ```
 */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return (
    typeof e === 'object' &&
    e !== null &&
    'code' in e &&
    typeof e.code === 'string'
  );
}

/**
 * Normalize an unknown thrown value to an Error
 *
 * Errors pass through unchanged; strings and other values become the
 * message of a new Error.
 */
export function normalizeError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }

  let detail: string;
  if (typeof error === 'string') {
    detail = error;
  } else if (typeof error === 'object' && error !== null) {
    try {
      detail = JSON.stringify(error);
    } catch {
      // Circular reference or BigInt
      detail = String(error);
    }
  } else {
    detail = String(error);
  }

  return new Error(detail);
}

/**
 * Format a byte count in human-readable form
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KiB`;
  }
  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
  }
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GiB`;
}
