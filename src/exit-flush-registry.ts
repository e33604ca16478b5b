/**
 * Exit Flush Registry
 *
 * Process-wide set of persistent caches to close when the process exits,
 * so popular entries survive a normal shutdown even if the caller never
 * closed the cache.
 *
 * Lifecycle:
 * 1. Starts empty; nothing is attached to the process until the first
 *    register()
 * 2. The first register() installs a one-time `exit` listener
 * 3. On exit, every registered cache that is still alive gets close()
 *
 * Caches are held through WeakRef. A cache nothing else references may be
 * collected before exit; its slot is then skipped silently.
 *
 * Best effort only: `exit` listeners run for normal termination and
 * process.exit(), not for crashes or unhandled signals. handleSignals()
 * covers SIGINT/SIGTERM for embedders that want it.
 */

import * as os from 'os';
import { resolveLogLevel } from './config.js';
import { ConsoleCacheLogger } from './observability/console-logger.js';
import type { ICacheLogger } from './observability/interfaces/cache-logger.js';
import type { Closable } from './types.js';
import { normalizeError } from './utils.js';

export type FlushSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export interface ExitFlushRegistryOptions {
  /** Emitter whose `exit` (and signal) events trigger a flush (default: process) */
  target?: NodeJS.EventEmitter;
  /** Called after a signal-triggered flush (default: process.exit) */
  exit?: (code: number) => void;
  /** Event sink for flush failures (default: ConsoleCacheLogger at LRU_CACHE_LOG_LEVEL) */
  logger?: ICacheLogger;
}

export class ExitFlushRegistry {
  private readonly refs = new Set<WeakRef<Closable>>();
  private readonly finalizer = new FinalizationRegistry<WeakRef<Closable>>((ref) => {
    this.refs.delete(ref);
  });
  private readonly target: NodeJS.EventEmitter;
  private readonly exit: (code: number) => void;
  private readonly logger: ICacheLogger;
  private exitHookInstalled = false;
  private readonly handledSignals = new Set<FlushSignal>();

  constructor(options: ExitFlushRegistryOptions = {}) {
    this.target = options.target ?? process;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.logger = options.logger ?? new ConsoleCacheLogger({ level: resolveLogLevel() });
  }

  /**
   * Number of registered caches not yet collected
   */
  get size(): number {
    let live = 0;
    for (const ref of this.refs) {
      if (ref.deref() !== undefined) live++;
    }
    return live;
  }

  /**
   * Flush `cache` on exit, without keeping it alive
   *
   * Registering the same cache twice has no effect.
   */
  register(cache: Closable): void {
    if (this.find(cache)) {
      return;
    }

    const ref = new WeakRef(cache);
    this.refs.add(ref);
    this.finalizer.register(cache, ref, ref);
    this.installExitHook();
  }

  /**
   * Stop flushing `cache` on exit
   *
   * @returns true if it was registered
   */
  unregister(cache: Closable): boolean {
    const ref = this.find(cache);
    if (!ref) {
      return false;
    }
    this.refs.delete(ref);
    this.finalizer.unregister(ref);
    return true;
  }

  /**
   * Close every live registered cache
   *
   * A failing close() is logged and does not stop the others.
   *
   * @returns Number of caches closed successfully
   */
  flushAll(): number {
    let closed = 0;

    for (const ref of Array.from(this.refs)) {
      const cache = ref.deref();
      if (cache === undefined) {
        this.refs.delete(ref);
        continue;
      }

      try {
        cache.close();
        closed++;
      } catch (error) {
        const err = normalizeError(error);
        this.logger.error({ event: 'exit_flush_failed', message: err.message });
      }
    }

    this.logger.debug({ event: 'exit_flush', count: closed });
    return closed;
  }

  /**
   * Flush and exit on the given signals
   *
   * Node does not run `exit` listeners when a signal terminates the
   * process, so caches would otherwise be lost on Ctrl+C. Exit code
   * follows the shell convention of 128 + signal number.
   */
  handleSignals(signals: FlushSignal[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      if (this.handledSignals.has(signal)) {
        continue;
      }
      this.handledSignals.add(signal);

      this.target.once(signal, () => {
        this.flushAll();
        this.exit(128 + os.constants.signals[signal]);
      });
    }
  }

  private installExitHook(): void {
    if (this.exitHookInstalled) {
      return;
    }
    this.exitHookInstalled = true;
    this.target.once('exit', () => {
      this.flushAll();
    });
  }

  private find(cache: Closable): WeakRef<Closable> | undefined {
    for (const ref of this.refs) {
      if (ref.deref() === cache) {
        return ref;
      }
    }
    return undefined;
  }
}

/**
 * The process-wide registry persistent caches join by default
 */
export const exitFlushRegistry = new ExitFlushRegistry();
