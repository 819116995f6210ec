import type {
  CacheEntry,
  ProviderSource,
  SearchResolution,
} from '@quarry/shared/src/types/search.types.js';

export interface SearchCacheRepository {
  /** Fresh entries only. A hit marks the entry as most recently used. */
  get(key: string): Promise<CacheEntry | null>;
  /** Expired entries still inside the grace window. */
  getStale(key: string): Promise<CacheEntry | null>;
  put(
    key: string,
    resolution: SearchResolution,
    ttlMs: number,
    source: ProviderSource,
  ): Promise<void>;
  evictIfNeeded(): Promise<void>;
  has(key: string): Promise<boolean>;
  size(): Promise<number>;
  clear(): Promise<void>;
}
