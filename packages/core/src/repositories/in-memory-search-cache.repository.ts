import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import type {
  CacheEntry,
  ProviderSource,
  SearchResolution,
} from '@quarry/shared/src/types/search.types.js';
import type { SearchCacheRepository } from './search-cache.repository.js';

const log = createChildLogger('cache:memory');

const DEFAULT_MAX_ENTRIES = 500;
const DEFAULT_GRACE_MS = 5 * 60 * 1000;

export interface InMemorySearchCacheOptions {
  readonly maxEntries?: number;
  readonly graceMs?: number;
  readonly now?: () => number;
}

/**
 * LRU cache keyed by cache key. `Map` iteration order doubles as the recency
 * list: the first key is the least recently used one. Every method body runs
 * synchronously, so writes for a key can never interleave.
 */
export function createInMemorySearchCacheRepository(
  options: InMemorySearchCacheOptions = {},
): SearchCacheRepository {
  const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
  const now = options.now ?? Date.now;

  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new ConfigurationError(`Cache capacity must be a positive integer, got ${String(maxEntries)}`);
  }

  const entries = new Map<string, CacheEntry>();

  function expiresAt(entry: CacheEntry): number {
    return entry.createdAt.getTime() + entry.ttlMs;
  }

  function isFresh(entry: CacheEntry): boolean {
    return now() < expiresAt(entry);
  }

  function isWithinGrace(entry: CacheEntry): boolean {
    return now() < expiresAt(entry) + graceMs;
  }

  function touch(key: string, entry: CacheEntry): void {
    entries.delete(key);
    entries.set(key, entry);
  }

  function evict(): void {
    for (const [key, entry] of entries) {
      if (!isWithinGrace(entry)) {
        entries.delete(key);
      }
    }

    while (entries.size > maxEntries) {
      const oldest = entries.keys().next();
      if (oldest.done) {
        break;
      }
      entries.delete(oldest.value);
      log.debug({ key: oldest.value, maxEntries }, 'Evicted least recently used entry');
    }
  }

  return {
    get(key: string): Promise<CacheEntry | null> {
      const entry = entries.get(key);
      if (!entry) {
        return Promise.resolve(null);
      }

      if (!isFresh(entry)) {
        if (!isWithinGrace(entry)) {
          entries.delete(key);
        }
        return Promise.resolve(null);
      }

      touch(key, entry);
      return Promise.resolve(entry);
    },

    getStale(key: string): Promise<CacheEntry | null> {
      const entry = entries.get(key);
      if (!entry || isFresh(entry)) {
        return Promise.resolve(null);
      }

      if (!isWithinGrace(entry)) {
        entries.delete(key);
        return Promise.resolve(null);
      }

      return Promise.resolve(entry);
    },

    put(
      key: string,
      resolution: SearchResolution,
      ttlMs: number,
      source: ProviderSource,
    ): Promise<void> {
      const entry: CacheEntry = {
        key,
        insight: resolution.insight,
        extractiveSummary: resolution.extractiveSummary,
        rawResults: resolution.rawResults,
        createdAt: new Date(now()),
        ttlMs,
        source,
      };
      touch(key, entry);
      evict();
      return Promise.resolve();
    },

    evictIfNeeded(): Promise<void> {
      evict();
      return Promise.resolve();
    },

    has(key: string): Promise<boolean> {
      const entry = entries.get(key);
      return Promise.resolve(entry !== undefined && isFresh(entry));
    },

    size(): Promise<number> {
      return Promise.resolve(entries.size);
    },

    clear(): Promise<void> {
      entries.clear();
      return Promise.resolve();
    },
  };
}
