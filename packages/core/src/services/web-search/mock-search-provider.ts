import { createChildLogger } from '@quarry/shared/src/logger.js';
import type { RawSearchResult } from '@quarry/shared/src/types/search.types.js';
import { normalizeQueryText } from '../search/cache-key.js';

const log = createChildLogger('web-search:mock');

export interface MockSearchProvider {
  readonly name: string;
  query(text: string): Promise<RawSearchResult>;
}

/**
 * Deterministic provider for local runs. It takes only the query text, so one
 * instance can stand in for both the primary and the fallback provider.
 * Responses are looked up by normalized query text.
 */
export function createMockSearchProvider(
  name: string,
  responses?: Map<string, RawSearchResult>,
): MockSearchProvider {
  log.info({ provider: name }, 'Using mock search provider');

  const normalizedResponses = new Map<string, RawSearchResult>();
  for (const [query, response] of responses ?? []) {
    normalizedResponses.set(normalizeQueryText(query), response);
  }

  return {
    name,

    query(text: string): Promise<RawSearchResult> {
      log.debug({ provider: name, query: text }, 'Mock search');

      const response = normalizedResponses.get(normalizeQueryText(text)) ?? {
        items: [
          {
            title: `Mock result for ${text}`,
            url: 'https://example.com/source1',
            snippet: `Mock search result with general information about ${text}. It is served by the ${name} mock provider.`,
          },
          {
            title: `More about ${text}`,
            url: 'https://example.com/source2',
            snippet: `A second mock page that also mentions ${text} and related background.`,
          },
        ],
      };
      return Promise.resolve(response);
    },
  };
}
