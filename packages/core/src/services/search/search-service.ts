import type {
  EnhancedSearchResponse,
  SearchInsight,
} from '@quarry/shared/src/types/search.types.js';
import type { SearchParamsInput } from '@quarry/schemas/src/search-params.schema.js';
import type { SearchOptions, SearchOrchestrator } from './types.js';

export const DEGRADED_REPLY =
  "Sorry, I couldn't reach any search provider right now. Please try again in a moment.";

export interface SearchService {
  searchTheWeb(query: string, requesterId: string, searchType?: string): Promise<string>;
  enhancedSearch(
    query: string,
    requesterId: string,
    searchType?: string,
    params?: SearchParamsInput,
    options?: SearchOptions,
  ): Promise<EnhancedSearchResponse>;
}

export function toPlainTextReply(insight: SearchInsight): string {
  if (insight.status === 'degraded') {
    return DEGRADED_REPLY;
  }
  return insight.directAnswer ?? insight.summary;
}

export function createSearchService(orchestrator: SearchOrchestrator): SearchService {
  async function enhancedSearch(
    query: string,
    requesterId: string,
    searchType = 'general',
    params: SearchParamsInput = {},
    options?: SearchOptions,
  ): Promise<EnhancedSearchResponse> {
    const { insight, extractiveSummary, rawResults } = await orchestrator.resolve(
      { text: query, requesterId, type: searchType, params },
      options,
    );
    return {
      insight,
      summary: extractiveSummary,
      keywords: insight.keywords,
      rawResults,
    };
  }

  return {
    enhancedSearch,

    async searchTheWeb(
      query: string,
      requesterId: string,
      searchType = 'general',
    ): Promise<string> {
      const { insight } = await enhancedSearch(query, requesterId, searchType);
      return toPlainTextReply(insight);
    },
  };
}
