import { describe, it, expect } from 'vitest';
import { createInMemorySearchCacheRepository } from './in-memory-search-cache.repository.js';
import type { SearchResolution } from '@quarry/shared/src/types/search.types.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';

function resolution(title: string): SearchResolution {
  return {
    insight: {
      title,
      summary: `${title} summary`,
      keywords: ['alpha'],
      url: `https://example.com/${title}`,
      source: 'primary',
      status: 'ok',
    },
    extractiveSummary: `${title} summary`,
    rawResults: [{ title, url: `https://example.com/${title}`, snippet: 'snippet' }],
  };
}

function createClock(start = 1_000_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('InMemorySearchCacheRepository', () => {
  it('should return null for cache miss', async () => {
    const repo = createInMemorySearchCacheRepository();
    expect(await repo.get('missing')).toBeNull();
  });

  it('should cache and retrieve an entry', async () => {
    const clock = createClock();
    const repo = createInMemorySearchCacheRepository({ now: clock.now });
    await repo.put('k1', resolution('one'), 60_000, 'primary');

    const entry = await repo.get('k1');
    expect(entry?.key).toBe('k1');
    expect(entry?.insight.title).toBe('one');
    expect(entry?.source).toBe('primary');
    expect(entry?.ttlMs).toBe(60_000);
    expect(entry?.createdAt.getTime()).toBe(1_000_000);
    expect(entry?.rawResults).toHaveLength(1);
  });

  it('should treat expired entries as absent but keep them for stale reads within the grace window', async () => {
    const clock = createClock();
    const repo = createInMemorySearchCacheRepository({ now: clock.now, graceMs: 30_000 });
    await repo.put('k1', resolution('one'), 60_000, 'fallback');

    clock.advance(60_000);
    expect(await repo.get('k1')).toBeNull();
    expect(await repo.has('k1')).toBe(false);

    const stale = await repo.getStale('k1');
    expect(stale?.insight.title).toBe('one');
    expect(stale?.source).toBe('fallback');
  });

  it('should not serve fresh entries through getStale', async () => {
    const repo = createInMemorySearchCacheRepository();
    await repo.put('k1', resolution('one'), 60_000, 'primary');
    expect(await repo.getStale('k1')).toBeNull();
  });

  it('should drop entries once the grace window has passed', async () => {
    const clock = createClock();
    const repo = createInMemorySearchCacheRepository({ now: clock.now, graceMs: 30_000 });
    await repo.put('k1', resolution('one'), 60_000, 'primary');

    clock.advance(90_000);
    expect(await repo.getStale('k1')).toBeNull();
    expect(await repo.size()).toBe(0);
  });

  it('should evict the least recently used entry when inserting at capacity', async () => {
    const repo = createInMemorySearchCacheRepository({ maxEntries: 2 });
    await repo.put('a', resolution('a'), 60_000, 'primary');
    await repo.put('b', resolution('b'), 60_000, 'primary');

    // Reading "a" makes "b" the least recently used entry.
    await repo.get('a');
    await repo.put('c', resolution('c'), 60_000, 'primary');

    expect(await repo.size()).toBe(2);
    expect(await repo.get('b')).toBeNull();
    expect((await repo.get('a'))?.insight.title).toBe('a');
    expect((await repo.get('c'))?.insight.title).toBe('c');
  });

  it('should overwrite an existing key without growing the store', async () => {
    const repo = createInMemorySearchCacheRepository({ maxEntries: 2 });
    await repo.put('a', resolution('first'), 60_000, 'primary');
    await repo.put('a', resolution('second'), 60_000, 'fallback');

    expect(await repo.size()).toBe(1);
    const entry = await repo.get('a');
    expect(entry?.insight.title).toBe('second');
    expect(entry?.source).toBe('fallback');
  });

  it('should purge entries past their grace window on evictIfNeeded', async () => {
    const clock = createClock();
    const repo = createInMemorySearchCacheRepository({ now: clock.now, graceMs: 0 });
    await repo.put('a', resolution('a'), 1_000, 'primary');
    await repo.put('b', resolution('b'), 10_000, 'primary');

    clock.advance(5_000);
    await repo.evictIfNeeded();

    expect(await repo.size()).toBe(1);
    expect(await repo.has('b')).toBe(true);
  });

  it('should empty the store on clear', async () => {
    const repo = createInMemorySearchCacheRepository();
    await repo.put('a', resolution('a'), 60_000, 'primary');
    await repo.clear();
    expect(await repo.size()).toBe(0);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => createInMemorySearchCacheRepository({ maxEntries: 0 })).toThrow(
      ConfigurationError,
    );
  });
});
