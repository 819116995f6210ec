import type {
  ProviderSource,
  RawSearchResult,
  SearchParams,
  SearchQuery,
  SearchType,
} from '@quarry/shared/src/types/search.types.js';

export interface PrimaryCallOptions {
  readonly signal?: AbortSignal;
  readonly searchType: SearchType;
}

export interface FallbackCallOptions {
  readonly signal?: AbortSignal;
  readonly maxResults: number;
}

export interface PrimarySearchProvider {
  readonly name: string;
  query(text: string, params: SearchParams, options: PrimaryCallOptions): Promise<RawSearchResult>;
}

export interface FallbackSearchProvider {
  readonly name: string;
  query(text: string, options: FallbackCallOptions): Promise<RawSearchResult>;
}

export type GatewayState =
  | 'idle'
  | 'primary_call'
  | 'primary_failed'
  | 'fallback_call'
  | 'fallback_failed'
  | 'failed'
  | 'success';

export interface GatewayOutcome {
  readonly result: RawSearchResult;
  readonly source: ProviderSource;
  readonly transitions: readonly GatewayState[];
}

export interface ProviderGateway {
  fetch(query: SearchQuery): Promise<GatewayOutcome>;
}
