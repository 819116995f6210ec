import { describe, it, expect, vi } from 'vitest';
import { ProviderError, ValidationError } from '@quarry/shared/src/utils/errors.js';
import type {
  ProviderSource,
  RawSearchResult,
  SearchResolution,
} from '@quarry/shared/src/types/search.types.js';
import { validateSearchQuery } from '@quarry/schemas/src/validators.js';
import { createInMemorySearchCacheRepository } from '../../repositories/in-memory-search-cache.repository.js';
import type { SearchCacheRepository } from '../../repositories/search-cache.repository.js';
import { createContentProcessor } from '../content/content-processor.js';
import { createProviderGateway } from '../web-search/provider-gateway.js';
import type { GatewayOutcome, ProviderGateway } from '../web-search/types.js';
import { computeCacheKey } from './cache-key.js';
import { createInFlightRegistry } from './in-flight-registry.js';
import { createSearchOrchestrator } from './search-orchestrator.js';
import type { SearchOrchestratorConfig } from './types.js';
import { createWorkerPool } from './worker-pool.js';

const TTL_MS = 600_000;
const NEWS_TTL_MS = 300_000;

const tidalResult: RawSearchResult = {
  items: [{ title: 'Tides', url: 'https://primary.example/tides', snippet: 'Tidal power uses tides.' }],
};

function outcome(result: RawSearchResult, source: ProviderSource = 'primary'): GatewayOutcome {
  return {
    result,
    source,
    transitions:
      source === 'primary'
        ? ['idle', 'primary_call', 'success']
        : ['idle', 'primary_call', 'primary_failed', 'fallback_call', 'success'],
  };
}

function keyFor(input: { text: string; type?: string; params?: unknown }): string {
  return computeCacheKey(validateSearchQuery({ ...input, requesterId: 'test' }));
}

function setup(
  options: {
    cacheRepository?: SearchCacheRepository;
    config?: Partial<SearchOrchestratorConfig>;
  } = {},
) {
  let clock = 1_000_000;
  const cacheRepository =
    options.cacheRepository ?? createInMemorySearchCacheRepository({ now: () => clock });
  const inFlightRegistry = createInFlightRegistry<SearchResolution>();
  const fetch = vi.fn<ProviderGateway['fetch']>().mockResolvedValue(outcome(tidalResult));

  const orchestrator = createSearchOrchestrator(
    {
      cacheRepository,
      inFlightRegistry,
      providerGateway: { fetch },
      contentProcessor: createContentProcessor(),
    },
    { ttlMs: TTL_MS, newsTtlMs: NEWS_TTL_MS, ...options.config },
  );

  return {
    orchestrator,
    cacheRepository,
    inFlightRegistry,
    fetch,
    advance(ms: number): void {
      clock += ms;
    },
  };
}

describe('SearchOrchestrator', () => {
  it('should resolve through the provider and cache the result', async () => {
    const { orchestrator, cacheRepository, fetch } = setup();

    const resolution = await orchestrator.resolve({ text: 'tidal energy', requesterId: 'user-1' });

    expect(resolution.insight).toMatchObject({
      title: 'Tides',
      summary: 'Tidal power uses tides.',
      url: 'https://primary.example/tides',
      source: 'primary',
      status: 'ok',
    });
    expect(resolution.extractiveSummary).toBe('Tidal power uses tides.');
    expect(resolution.rawResults).toEqual(tidalResult.items);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(await cacheRepository.has(keyFor({ text: 'tidal energy' }))).toBe(true);
  });

  it('should answer a repeated query from the cache with the same content', async () => {
    const { orchestrator, fetch } = setup();

    const first = await orchestrator.search({ text: 'tidal energy', requesterId: 'user-1' });
    const second = await orchestrator.search({ text: '  Tidal   ENERGY ', requesterId: 'user-2' });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(second).toEqual({ ...first, source: 'cache' });
  });

  it('should share one provider call between concurrent identical queries', async () => {
    const { orchestrator, fetch, inFlightRegistry } = setup();
    let release: (value: GatewayOutcome) => void = () => undefined;
    fetch.mockReturnValue(
      new Promise<GatewayOutcome>((resolve) => {
        release = resolve;
      }),
    );

    const pending = Array.from({ length: 5 }, (_, i) =>
      orchestrator.search({ text: 'tidal energy', requesterId: `user-${String(i)}` }),
    );
    await vi.waitFor(() => {
      expect(fetch).toHaveBeenCalledTimes(1);
    });
    expect(inFlightRegistry.size()).toBe(1);

    release(outcome(tidalResult));
    const insights = await Promise.all(pending);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(new Set(insights.map((insight) => insight.summary))).toEqual(
      new Set(['Tidal power uses tides.']),
    );
    expect(insights.every((insight) => insight.source === 'primary')).toBe(true);
    expect(inFlightRegistry.size()).toBe(0);
  });

  it('should report the fallback as the source when it answered', async () => {
    const { orchestrator, fetch } = setup();
    fetch.mockResolvedValue(outcome(tidalResult, 'fallback'));

    const insight = await orchestrator.search({ text: 'tidal energy' });

    expect(insight.source).toBe('fallback');
    expect(insight.status).toBe('ok');
  });

  it('should reject invalid queries before any provider work', async () => {
    const { orchestrator, fetch } = setup();

    await expect(orchestrator.search({ text: '   ', requesterId: 'user-1' })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(
      orchestrator.search({ text: 'ok', params: { maxResults: 0 } }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(orchestrator.search({ text: 'ok', type: 'video' })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should return a degraded insight when every provider fails', async () => {
    const { orchestrator, cacheRepository, fetch } = setup();
    fetch.mockRejectedValue(new ProviderError('All search providers failed', 'fallback', 'http'));

    const insight = await orchestrator.search({ text: 'tidal energy' });

    expect(insight).toEqual({
      title: 'Search unavailable',
      summary: '',
      keywords: [],
      url: '',
      source: 'fallback',
      status: 'degraded',
    });
    expect(await cacheRepository.size()).toBe(0);
  });

  it('should serve an expired entry within the grace window when providers fail', async () => {
    const { orchestrator, fetch, advance } = setup();
    const fresh = await orchestrator.search({ text: 'tidal energy' });

    advance(TTL_MS + 1);
    fetch.mockRejectedValue(new ProviderError('All search providers failed', 'fallback', 'timeout'));
    const stale = await orchestrator.search({ text: 'tidal energy' });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(stale).toEqual({ ...fresh, source: 'cache', status: 'stale' });
  });

  it('should serve an expired entry when the primary fails and the fallback is empty', async () => {
    const { orchestrator, cacheRepository, fetch, advance } = setup();
    const fresh = await orchestrator.search({ text: 'tidal energy' });

    advance(TTL_MS + 1);
    fetch.mockResolvedValue(outcome({ items: [] }, 'fallback'));
    const stale = await orchestrator.search({ text: 'tidal energy' });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(stale).toEqual({ ...fresh, source: 'cache', status: 'stale' });
    expect(await cacheRepository.has(keyFor({ text: 'tidal energy' }))).toBe(false);
  });

  it('should join a finished resolution through the cache when the first lookup was slow', async () => {
    const inner = createInMemorySearchCacheRepository();
    const slowCache: SearchCacheRepository = {
      ...inner,
      async get(key: string) {
        const snapshot = await inner.get(key);
        await new Promise((resolve) => setTimeout(resolve, 30));
        return snapshot;
      },
    };
    const { orchestrator, fetch } = setup({ cacheRepository: slowCache });
    fetch.mockImplementation(
      () =>
        new Promise<GatewayOutcome>((resolve) => {
          setTimeout(() => {
            resolve(outcome(tidalResult));
          }, 20);
        }),
    );

    const first = orchestrator.search({ text: 'tidal energy', requesterId: 'user-a' });
    await new Promise((resolve) => setTimeout(resolve, 40));
    const second = orchestrator.search({ text: 'tidal energy', requesterId: 'user-b' });
    const [a, b] = await Promise.all([first, second]);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(b.summary).toBe(a.summary);
  });

  it('should refresh an expired entry when providers are up', async () => {
    const { orchestrator, fetch, advance } = setup();
    await orchestrator.search({ text: 'tidal energy' });

    advance(TTL_MS + 1);
    const insight = await orchestrator.search({ text: 'tidal energy' });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(insight.source).toBe('primary');
  });

  it('should not cache a no-results answer', async () => {
    const { orchestrator, cacheRepository, fetch } = setup();
    fetch.mockResolvedValue(outcome({ items: [] }, 'fallback'));

    const insight = await orchestrator.search({ text: 'xyzzy plugh' });

    expect(insight).toMatchObject({ status: 'no_results', summary: 'No good answer found.' });
    expect(await cacheRepository.size()).toBe(0);
  });

  it('should cache news with the news TTL', async () => {
    const { orchestrator, cacheRepository } = setup();
    const put = vi.spyOn(cacheRepository, 'put');

    await orchestrator.search({ text: 'election results', type: 'news' });

    expect(put).toHaveBeenCalledWith(expect.any(String), expect.anything(), NEWS_TTL_MS, 'primary');
  });

  it('should bypass a failing cache', async () => {
    const broken: SearchCacheRepository = {
      get: () => Promise.reject(new Error('cache offline')),
      getStale: () => Promise.reject(new Error('cache offline')),
      put: () => Promise.reject(new Error('cache offline')),
      evictIfNeeded: () => Promise.resolve(),
      has: () => Promise.resolve(false),
      size: () => Promise.resolve(0),
      clear: () => Promise.resolve(),
    };
    const { orchestrator, fetch } = setup({ cacheRepository: broken });

    const insight = await orchestrator.search({ text: 'tidal energy' });
    expect(insight.source).toBe('primary');

    fetch.mockRejectedValue(new ProviderError('All search providers failed', 'fallback', 'http'));
    expect((await orchestrator.search({ text: 'tidal energy' })).status).toBe('degraded');
  });

  it('should stop waiting at the caller timeout while the resolution still fills the cache', async () => {
    const { orchestrator, cacheRepository, fetch } = setup();
    let release: (value: GatewayOutcome) => void = () => undefined;
    fetch.mockReturnValue(
      new Promise<GatewayOutcome>((resolve) => {
        release = resolve;
      }),
    );

    const insight = await orchestrator.search({ text: 'tidal energy' }, { timeoutMs: 10 });
    expect(insight.status).toBe('degraded');

    release(outcome(tidalResult));
    const key = keyFor({ text: 'tidal energy' });
    await vi.waitFor(async () => {
      expect(await cacheRepository.has(key)).toBe(true);
    });

    const cached = await orchestrator.search({ text: 'tidal energy' });
    expect(cached).toMatchObject({ source: 'cache', status: 'ok' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should resolve a one-day news query end to end through the primary provider', async () => {
    const primaryQuery = vi.fn().mockResolvedValue({
      items: [
        {
          title: 'Parliament session opens',
          url: 'https://news.example/india/parliament',
          snippet: 'The monsoon session of Parliament opened in New Delhi today. Several bills are listed.',
        },
      ],
    });
    const fallbackQuery = vi.fn();
    const cacheRepository = createInMemorySearchCacheRepository();
    const orchestrator = createSearchOrchestrator(
      {
        cacheRepository,
        inFlightRegistry: createInFlightRegistry<SearchResolution>(),
        providerGateway: createProviderGateway(
          {
            primary: { name: 'primary', query: primaryQuery },
            fallback: { name: 'fallback', query: fallbackQuery },
            pool: createWorkerPool(4),
          },
          { timeoutMs: 1000, fallbackMaxResults: 5 },
        ),
        contentProcessor: createContentProcessor(),
      },
      { ttlMs: TTL_MS, newsTtlMs: NEWS_TTL_MS },
    );

    const input = { text: "today's India news", type: 'news', params: { days: 1 } };
    const insight = await orchestrator.search({ ...input, requesterId: '123' });

    expect(insight.source).toBe('primary');
    expect(insight.summary.length).toBeGreaterThan(0);
    expect(fallbackQuery).not.toHaveBeenCalled();
    expect(primaryQuery.mock.calls[0][2]).toMatchObject({ searchType: 'news' });
    expect(await cacheRepository.has(keyFor(input))).toBe(true);
  });
});
