import { createChildLogger } from '@quarry/shared/src/logger.js';
import { CacheError, ProviderError, toError } from '@quarry/shared/src/utils/errors.js';
import type {
  CacheEntry,
  InsightStatus,
  ProviderSource,
  SearchInsight,
  SearchQuery,
  SearchResolution,
  SearchType,
} from '@quarry/shared/src/types/search.types.js';
import { validateSearchQuery } from '@quarry/schemas/src/validators.js';
import { enrichWithPageText } from '../content/page-text-fetcher.js';
import { computeCacheKey } from './cache-key.js';
import { assembleInsight, createDegradedInsight } from './result-assembler.js';
import type {
  SearchOptions,
  SearchOrchestrator,
  SearchOrchestratorConfig,
  SearchOrchestratorDeps,
  SearchRequestInput,
} from './types.js';

const log = createChildLogger('search:orchestrator');

const LOGGED_QUERY_LENGTH = 50;

function fromCacheEntry(entry: CacheEntry, status: InsightStatus): SearchResolution {
  return {
    insight: { ...entry.insight, source: 'cache', status },
    extractiveSummary: entry.extractiveSummary,
    rawResults: entry.rawResults,
  };
}

function degradedResolution(): SearchResolution {
  return { insight: createDegradedInsight(), extractiveSummary: '', rawResults: [] };
}

async function waitFor<T>(pending: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (timeoutMs === undefined) {
    return pending;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ProviderError(`Search wait exceeded ${String(timeoutMs)}ms`, 'caller', 'timeout'));
    }, timeoutMs);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createSearchOrchestrator(
  deps: SearchOrchestratorDeps,
  config: SearchOrchestratorConfig,
): SearchOrchestrator {
  const { cacheRepository, inFlightRegistry, providerGateway, contentProcessor, pageTextFetcher } =
    deps;

  function ttlFor(type: SearchType): number {
    return type === 'news' ? config.newsTtlMs : config.ttlMs;
  }

  async function readCache(key: string, stale: boolean): Promise<CacheEntry | null> {
    try {
      return stale ? await cacheRepository.getStale(key) : await cacheRepository.get(key);
    } catch (error) {
      const failure = new CacheError('Cache read failed', toError(error));
      log.warn({ key, stale, error: failure.cause?.message }, 'Cache unavailable, bypassing');
      return null;
    }
  }

  async function writeCache(
    key: string,
    resolution: SearchResolution,
    ttlMs: number,
    source: ProviderSource,
  ): Promise<void> {
    try {
      await cacheRepository.put(key, resolution, ttlMs, source);
    } catch (error) {
      const failure = new CacheError('Cache write failed', toError(error));
      log.warn({ key, error: failure.cause?.message }, 'Cache unavailable, result not cached');
    }
  }

  async function resolveUpstream(query: SearchQuery, key: string): Promise<SearchResolution> {
    // A caller whose first lookup raced a finishing resolution finds its result here.
    const cached = await readCache(key, false);
    if (cached) {
      log.debug({ key }, 'Cache filled while waiting, skipping upstream');
      return fromCacheEntry(cached, 'ok');
    }

    const outcome = await providerGateway.fetch(query);

    const raw =
      pageTextFetcher && config.pageTextMaxResults
        ? await enrichWithPageText(outcome.result, pageTextFetcher, config.pageTextMaxResults)
        : outcome.result;

    const processed = await contentProcessor.process(raw, { language: query.params.language });
    const insight = assembleInsight(raw, processed, outcome.source);
    const resolution: SearchResolution = {
      insight,
      extractiveSummary: processed.summary,
      rawResults: outcome.result.items,
    };

    // A fallback answer means the primary already failed.
    if (insight.status === 'no_results' && outcome.source === 'fallback') {
      const stale = await readCache(key, true);
      if (stale) {
        log.warn({ key, transitions: outcome.transitions }, 'Fallback was empty, serving stale cache entry');
        return fromCacheEntry(stale, 'stale');
      }
    }

    // A "no results" answer is not cached so the next request asks again.
    if (insight.status === 'ok') {
      await writeCache(key, resolution, ttlFor(query.type), outcome.source);
    }

    log.info(
      {
        key,
        source: outcome.source,
        status: insight.status,
        itemCount: raw.items.length,
        transitions: outcome.transitions,
      },
      'Search resolved upstream',
    );
    return resolution;
  }

  async function recover(key: string, error: unknown): Promise<SearchResolution> {
    const stale = await readCache(key, true);
    if (stale) {
      log.warn({ key, error: toError(error).message }, 'Serving stale cache entry');
      return fromCacheEntry(stale, 'stale');
    }

    log.warn({ key, error: toError(error).message }, 'No data available, returning degraded insight');
    return degradedResolution();
  }

  async function resolve(
    input: SearchRequestInput,
    options: SearchOptions = {},
  ): Promise<SearchResolution> {
    const query = validateSearchQuery(input);
    const key = computeCacheKey(query);

    log.info(
      {
        requesterId: query.requesterId,
        query: query.text.slice(0, LOGGED_QUERY_LENGTH),
        type: query.type,
      },
      'Search requested',
    );

    const cached = await readCache(key, false);
    if (cached) {
      log.debug({ key }, 'Cache hit');
      return fromCacheEntry(cached, 'ok');
    }

    const pending = inFlightRegistry.joinOrStart(key, () => resolveUpstream(query, key));

    try {
      return await waitFor(pending, options.timeoutMs ?? config.waitTimeoutMs);
    } catch (error) {
      return recover(key, error);
    }
  }

  return {
    resolve,

    async search(input: SearchRequestInput, options?: SearchOptions): Promise<SearchInsight> {
      const { insight } = await resolve(input, options);
      return insight;
    },
  };
}
