import type { SearchResolution } from '@quarry/shared/src/types/search.types.js';
import type { ServiceConfig } from '@quarry/schemas/src/service-config.schema.js';
import type { ProviderCredentials } from '@quarry/schemas/src/config-loader.js';
import { createInMemorySearchCacheRepository } from '../../repositories/in-memory-search-cache.repository.js';
import type { SearchCacheRepository } from '../../repositories/search-cache.repository.js';
import { createContentProcessor } from '../content/content-processor.js';
import type { EnhancedSummarizer } from '../content/content-processor.js';
import { createPageTextFetcher } from '../content/page-text-fetcher.js';
import { createDuckDuckGoProvider } from '../web-search/duckduckgo-provider.js';
import { createMockSearchProvider } from '../web-search/mock-search-provider.js';
import { createProviderGateway } from '../web-search/provider-gateway.js';
import { createTavilyProvider } from '../web-search/tavily-provider.js';
import type { FallbackSearchProvider, PrimarySearchProvider } from '../web-search/types.js';
import { createInFlightRegistry } from './in-flight-registry.js';
import { createSearchOrchestrator } from './search-orchestrator.js';
import { createSearchService } from './search-service.js';
import type { SearchService } from './search-service.js';
import type { SearchOrchestrator } from './types.js';
import { createWorkerPool } from './worker-pool.js';
import type { WorkerPool } from './worker-pool.js';

export interface SearchStackOptions {
  readonly config: ServiceConfig;
  readonly credentials: ProviderCredentials;
  readonly mockProviders?: boolean;
  readonly summarizer?: EnhancedSummarizer;
  readonly fetchImpl?: typeof fetch;
}

export interface SearchStack {
  readonly service: SearchService;
  readonly orchestrator: SearchOrchestrator;
  readonly cacheRepository: SearchCacheRepository;
  readonly pool: WorkerPool;
}

function createProviders(options: SearchStackOptions): {
  primary: PrimarySearchProvider;
  fallback: FallbackSearchProvider;
} {
  if (options.mockProviders) {
    return {
      primary: createMockSearchProvider('mock-primary'),
      fallback: createMockSearchProvider('mock-fallback'),
    };
  }

  const { providers } = options.config;
  return {
    primary: createTavilyProvider({
      apiKey: options.credentials.tavilyApiKey,
      baseUrl: providers.primaryBaseUrl,
      fetchImpl: options.fetchImpl,
    }),
    fallback: createDuckDuckGoProvider({
      baseUrl: providers.fallbackBaseUrl,
      fetchImpl: options.fetchImpl,
    }),
  };
}

/** Builds one cache, registry and pool per process and wires them together. */
export function createSearchStack(options: SearchStackOptions): SearchStack {
  const { cache, providers, content, search } = options.config;

  const pool = createWorkerPool(providers.concurrency);
  const cacheRepository = createInMemorySearchCacheRepository({
    maxEntries: cache.maxEntries,
    graceMs: cache.graceMs,
  });
  const { primary, fallback } = createProviders(options);

  const orchestrator = createSearchOrchestrator(
    {
      cacheRepository,
      inFlightRegistry: createInFlightRegistry<SearchResolution>(),
      providerGateway: createProviderGateway(
        { primary, fallback, pool },
        { timeoutMs: providers.timeoutMs, fallbackMaxResults: providers.fallbackMaxResults },
      ),
      contentProcessor: createContentProcessor({
        summaryMaxChars: content.summaryMaxChars,
        keywordCount: content.keywordCount,
        summarizer: options.summarizer,
      }),
      pageTextFetcher: content.extractPageText
        ? createPageTextFetcher({
            pool,
            timeoutMs: content.pageTextTimeoutMs,
            fetchImpl: options.fetchImpl,
          })
        : undefined,
    },
    {
      ttlMs: cache.ttlMs,
      newsTtlMs: cache.newsTtlMs,
      waitTimeoutMs: search.waitTimeoutMs,
      pageTextMaxResults: content.pageTextMaxResults,
    },
  );

  return {
    service: createSearchService(orchestrator),
    orchestrator,
    cacheRepository,
    pool,
  };
}
