import type {
  ProcessedContent,
  ProviderSource,
  RawSearchResult,
  SearchInsight,
} from '@quarry/shared/src/types/search.types.js';
import { cleanText } from '../content/text-cleaning.js';

export const NO_RESULTS_TITLE = 'No results';
export const NO_RESULTS_SUMMARY = 'No good answer found.';
export const DIRECT_ANSWER_TITLE = 'Direct answer';
export const DEGRADED_TITLE = 'Search unavailable';

/**
 * Direct answer first, then the extractive summary of the items, then an
 * explicit "no results" insight. Every field is always set.
 */
export function assembleInsight(
  raw: RawSearchResult,
  processed: ProcessedContent,
  source: ProviderSource,
): SearchInsight {
  const first = raw.items.length > 0 ? raw.items[0] : undefined;
  const directAnswer = raw.directAnswer?.trim();

  if (directAnswer) {
    return {
      title: first?.title ?? DIRECT_ANSWER_TITLE,
      summary: directAnswer,
      keywords: processed.keywords,
      url: first?.url ?? '',
      directAnswer,
      source,
      status: 'ok',
    };
  }

  if (first) {
    return {
      title: first.title,
      summary: processed.summary || cleanText(first.snippet) || first.title,
      keywords: processed.keywords,
      url: first.url,
      source,
      status: 'ok',
    };
  }

  return {
    title: NO_RESULTS_TITLE,
    summary: NO_RESULTS_SUMMARY,
    keywords: [],
    url: '',
    source,
    status: 'no_results',
  };
}

export function createDegradedInsight(): SearchInsight {
  return {
    title: DEGRADED_TITLE,
    summary: '',
    keywords: [],
    url: '',
    source: 'fallback',
    status: 'degraded',
  };
}
