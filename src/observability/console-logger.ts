/**
 * Console Cache Logger
 *
 * Writes one JSON object per line (JSONL) to stderr. stdout is left to the
 * host program, which matters when the cache memoizes work inside a CLI
 * whose output is piped.
 *
 * @see https://jsonlines.org/
 */

import type {
  CacheLogEvent,
  CacheLogLevel,
  ICacheLogger,
} from './interfaces/cache-logger.js';

const LEVEL_RANK: Record<CacheLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

export interface ConsoleCacheLoggerOptions {
  /** Minimum level written (default: 'warn') */
  level?: CacheLogLevel;
  /** Value of the `logger` field on every line (default: 'lru-cache') */
  name?: string;
}

export class ConsoleCacheLogger implements ICacheLogger {
  readonly level: CacheLogLevel;
  private readonly name: string;

  constructor(options: ConsoleCacheLoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.name = options.name ?? 'lru-cache';
  }

  debug(event: CacheLogEvent): void {
    this.write('debug', event);
  }

  info(event: CacheLogEvent): void {
    this.write('info', event);
  }

  warn(event: CacheLogEvent): void {
    this.write('warn', event);
  }

  error(event: CacheLogEvent): void {
    this.write('error', event);
  }

  /**
   * Whether events at `level` are written
   */
  isEnabled(level: Exclude<CacheLogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(level: Exclude<CacheLogLevel, 'silent'>, event: CacheLogEvent): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      logger: this.name,
      ...event,
    });
    console.error(line);
  }
}
