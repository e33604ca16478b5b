/**
 * Cache Logger Interface
 *
 * The cache never formats log lines itself. Every operation hands a
 * structured event to an `ICacheLogger`; the default implementation writes
 * JSON lines to stderr, embedders can route events into their own logger.
 */

import type { CacheKey } from '../../types.js';

export type CacheLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type CacheEventName =
  | 'hit'
  | 'miss'
  | 'set'
  | 'delete'
  | 'clear'
  | 'evict'
  | 'trim'
  | 'load'
  | 'save'
  | 'save_skipped'
  | 'save_failed'
  | 'exit_flush'
  | 'exit_flush_failed';

export interface CacheLogEvent {
  /** Operation that produced the event */
  event: CacheEventName;
  /** Key involved (per-entry operations only) */
  key?: CacheKey;
  /** Entries affected (trim, load, exit flush) */
  count?: number;
  /** Backing file (load/save) */
  path?: string;
  /** Encoded size written (save) */
  bytes?: number;
  /** Human-readable detail */
  message?: string;
}

export interface ICacheLogger {
  debug(event: CacheLogEvent): void;
  info(event: CacheLogEvent): void;
  warn(event: CacheLogEvent): void;
  error(event: CacheLogEvent): void;
}
