/**
 * In-memory ICacheLogger for asserting on emitted events
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const cache = new LRUCache({ logger });
 * cache.get('missing');
 * expect(logger.names()).toEqual(['miss']);
 * ```
 */

import type {
  CacheEventName,
  CacheLogEvent,
  ICacheLogger,
} from '../../src/observability/interfaces/cache-logger.js';

export type RecordedLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecordedEvent extends CacheLogEvent {
  level: RecordedLevel;
}

export class RecordingLogger implements ICacheLogger {
  readonly events: RecordedEvent[] = [];

  debug(event: CacheLogEvent): void {
    this.events.push({ level: 'debug', ...event });
  }

  info(event: CacheLogEvent): void {
    this.events.push({ level: 'info', ...event });
  }

  warn(event: CacheLogEvent): void {
    this.events.push({ level: 'warn', ...event });
  }

  error(event: CacheLogEvent): void {
    this.events.push({ level: 'error', ...event });
  }

  names(): CacheEventName[] {
    return this.events.map((e) => e.event);
  }

  find(name: CacheEventName): RecordedEvent | undefined {
    return this.events.find((e) => e.event === name);
  }

  reset(): void {
    this.events.length = 0;
  }
}
