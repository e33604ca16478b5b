/**
 * Configuration for persistent-lru-cache
 *
 * Limits are resolved in order:
 * 1. Explicit constructor options
 * 2. Environment variables (LRU_CACHE_*)
 * 3. Defaults
 */

import { z } from 'zod';
import type { CacheLogLevel } from './observability/interfaces/cache-logger.js';

/**
 * Effectively unbounded entry count
 */
export const DEFAULT_MAX_ITEM_COUNT = Number.MAX_SAFE_INTEGER;

/**
 * 1 GiB
 */
export const DEFAULT_MAX_BYTE_SIZE = 1024 * 1024 * 1024;

export const DEFAULT_LOG_LEVEL: CacheLogLevel = 'warn';

export const CacheLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Cache limits schema
 *
 * maxByteSize may be 0: a budget below the encoding overhead trims the
 * cache to empty on every save.
 */
export const CacheLimitsSchema = z.object({
  /** Maximum number of entries; inserts past it evict the least recent */
  maxItemCount: z.number()
    .int()
    .min(1, 'maxItemCount must be at least 1')
    .max(Number.MAX_SAFE_INTEGER)
    .default(DEFAULT_MAX_ITEM_COUNT),
  /** Maximum encoded size in bytes, enforced by trim() */
  maxByteSize: z.number()
    .int()
    .min(0, 'maxByteSize cannot be negative')
    .max(Number.MAX_SAFE_INTEGER)
    .default(DEFAULT_MAX_BYTE_SIZE),
  /** Minimum level for the default console logger */
  logLevel: CacheLogLevelSchema.default(DEFAULT_LOG_LEVEL),
}).strict();

export type CacheLimits = z.infer<typeof CacheLimitsSchema>;
export type CacheLimitsInput = z.input<typeof CacheLimitsSchema>;

/**
 * Parse an environment variable as a number
 *
 * Number('') would be 0 and parseInt('10MB') would be 10, so both are
 * rejected here before zod sees the value.
 *
 * @throws {Error} If value is non-numeric
 */
function parseEnvNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(
      `Invalid numeric value for ${name}: "${value}". ` +
      `Expected a valid integer.`
    );
  }
  return parsed;
}

/**
 * Resolve the log level from an explicit option, LRU_CACHE_LOG_LEVEL, or the
 * default, ignoring the numeric limits
 *
 * @throws {z.ZodError} If the level is not a known one
 */
export function resolveLogLevel(
  level?: CacheLogLevel,
  env: NodeJS.ProcessEnv = process.env
): CacheLogLevel {
  const envLogLevel = env.LRU_CACHE_LOG_LEVEL?.trim();
  return CacheLogLevelSchema.default(DEFAULT_LOG_LEVEL).parse(
    level ?? (envLogLevel ? envLogLevel.toLowerCase() : undefined)
  );
}

/**
 * Resolve cache limits from options, environment and defaults
 *
 * @throws {z.ZodError} If a resolved value is out of range
 */
export function resolveCacheLimits(
  options: CacheLimitsInput = {},
  env: NodeJS.ProcessEnv = process.env
): CacheLimits {
  return CacheLimitsSchema.parse({
    maxItemCount:
      options.maxItemCount ?? parseEnvNumber(env.LRU_CACHE_MAX_ITEM_COUNT, 'LRU_CACHE_MAX_ITEM_COUNT'),
    maxByteSize:
      options.maxByteSize ?? parseEnvNumber(env.LRU_CACHE_MAX_BYTE_SIZE, 'LRU_CACHE_MAX_BYTE_SIZE'),
    logLevel: resolveLogLevel(options.logLevel, env),
  });
}
