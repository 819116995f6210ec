export type SearchType = 'general' | 'news' | 'image';

export type SearchDepth = 'basic' | 'advanced';

export interface SearchParams {
  readonly depth: SearchDepth;
  readonly maxResults: number;
  readonly includeDomains: readonly string[];
  readonly excludeDomains: readonly string[];
  readonly language: string;
  readonly days?: number;
  readonly includeImages: boolean;
}

export interface SearchQuery {
  readonly text: string;
  readonly type: SearchType;
  readonly params: SearchParams;
  readonly requesterId: string;
}

export interface RawSearchItem {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface RawSearchResult {
  readonly items: readonly RawSearchItem[];
  readonly directAnswer?: string;
}

/** Which upstream produced a result that went into the cache. */
export type ProviderSource = 'primary' | 'fallback';

export type InsightSource = ProviderSource | 'cache';

/**
 * `ok` is a regular answer, `no_results` means a provider answered with nothing,
 * `stale` is an expired cache entry served because both providers failed and
 * `degraded` is the empty answer returned when nothing at all was available.
 */
export type InsightStatus = 'ok' | 'no_results' | 'stale' | 'degraded';

export interface SearchInsight {
  readonly title: string;
  readonly summary: string;
  readonly keywords: readonly string[];
  readonly url: string;
  readonly directAnswer?: string;
  readonly source: InsightSource;
  readonly status: InsightStatus;
}

export interface ProcessedContent {
  readonly cleanedText: string;
  readonly summary: string;
  readonly keywords: readonly string[];
}

export interface SearchResolution {
  readonly insight: SearchInsight;
  readonly extractiveSummary: string;
  readonly rawResults: readonly RawSearchItem[];
}

export interface CacheEntry {
  readonly key: string;
  readonly insight: SearchInsight;
  readonly extractiveSummary: string;
  readonly rawResults: readonly RawSearchItem[];
  readonly createdAt: Date;
  readonly ttlMs: number;
  readonly source: ProviderSource;
}

export interface EnhancedSearchResponse {
  readonly insight: SearchInsight;
  readonly summary: string;
  readonly keywords: readonly string[];
  readonly rawResults: readonly RawSearchItem[];
}
