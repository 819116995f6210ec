import type {
  SearchInsight,
  SearchResolution,
} from '@quarry/shared/src/types/search.types.js';
import type { SearchParamsInput } from '@quarry/schemas/src/search-params.schema.js';
import type { SearchCacheRepository } from '../../repositories/search-cache.repository.js';
import type { ContentProcessor } from '../content/content-processor.js';
import type { PageTextFetcher } from '../content/page-text-fetcher.js';
import type { ProviderGateway } from '../web-search/types.js';
import type { InFlightRegistry } from './in-flight-registry.js';

/** A search request as received from a caller, before validation. */
export interface SearchRequestInput {
  readonly text: string;
  readonly type?: string;
  readonly params?: SearchParamsInput;
  readonly requesterId?: string;
}

export interface SearchOptions {
  /** Bounds this caller's wait only; the upstream resolution keeps running. */
  readonly timeoutMs?: number;
}

export interface SearchOrchestratorDeps {
  readonly cacheRepository: SearchCacheRepository;
  readonly inFlightRegistry: InFlightRegistry<SearchResolution>;
  readonly providerGateway: ProviderGateway;
  readonly contentProcessor: ContentProcessor;
  readonly pageTextFetcher?: PageTextFetcher;
}

export interface SearchOrchestratorConfig {
  readonly ttlMs: number;
  readonly newsTtlMs: number;
  readonly waitTimeoutMs?: number;
  readonly pageTextMaxResults?: number;
}

export interface SearchOrchestrator {
  resolve(input: SearchRequestInput, options?: SearchOptions): Promise<SearchResolution>;
  search(input: SearchRequestInput, options?: SearchOptions): Promise<SearchInsight>;
}
