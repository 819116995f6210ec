import { z } from 'zod';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ParseError, ProviderError } from '@quarry/shared/src/utils/errors.js';
import type {
  RawSearchItem,
  RawSearchResult,
  SearchParams,
} from '@quarry/shared/src/types/search.types.js';
import type { PrimaryCallOptions, PrimarySearchProvider } from './types.js';
import { providerErrorFromFetch, providerErrorFromStatus } from './http-failures.js';

const log = createChildLogger('web-search:tavily');

const PROVIDER_NAME = 'tavily';
const MAX_QUERY_LENGTH = 400;
const DEFAULT_BASE_URL = 'https://api.tavily.com';

const TavilyResultSchema = z
  .object({
    title: z.string().nullish(),
    url: z.string().min(1),
    content: z.string().nullish(),
  })
  .passthrough();

const TavilyImageSchema = z.union([
  z.string().min(1),
  z
    .object({
      url: z.string().min(1),
      description: z.string().nullish(),
    })
    .passthrough(),
]);

const TavilyResponseSchema = z
  .object({
    answer: z.string().nullish(),
    results: z.array(TavilyResultSchema).default([]),
    images: z.array(TavilyImageSchema).default([]),
  })
  .passthrough();

type TavilyResponse = z.infer<typeof TavilyResponseSchema>;

export interface TavilyProviderConfig {
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly fetchImpl?: typeof fetch;
}

type TimeRange = 'day' | 'week' | 'month' | 'year';

function timeRangeFromDays(days: number): TimeRange {
  if (days <= 1) {
    return 'day';
  }
  if (days <= 7) {
    return 'week';
  }
  if (days <= 31) {
    return 'month';
  }
  return 'year';
}

export function buildTavilyRequestBody(
  text: string,
  params: SearchParams,
  options: PrimaryCallOptions,
): Record<string, unknown> {
  const isNews = options.searchType === 'news';
  const wantsImages = options.searchType === 'image' || params.includeImages;

  const body: Record<string, unknown> = {
    query: text.slice(0, MAX_QUERY_LENGTH),
    topic: isNews ? 'news' : 'general',
    search_depth: params.depth,
    max_results: params.maxResults,
    include_answer: true,
    include_images: wantsImages,
  };

  if (wantsImages) {
    body['include_image_descriptions'] = true;
  }
  if (params.includeDomains.length > 0) {
    body['include_domains'] = [...params.includeDomains];
  }
  if (params.excludeDomains.length > 0) {
    body['exclude_domains'] = [...params.excludeDomains];
  }
  if (params.days !== undefined) {
    if (isNews) {
      body['days'] = params.days;
    } else {
      body['time_range'] = timeRangeFromDays(params.days);
    }
  }

  return body;
}

function toImageItems(images: TavilyResponse['images']): RawSearchItem[] {
  return images.map((image) => {
    if (typeof image === 'string') {
      return { title: 'Image result', url: image, snippet: '' };
    }
    const description = image.description?.trim() ?? '';
    return {
      title: description || 'Image result',
      url: image.url,
      snippet: description,
    };
  });
}

/**
 * Images lead, but up to half of the slots stay with pages so there is still
 * text to summarize when the provider returns many images.
 */
function imagesFirst(
  images: readonly RawSearchItem[],
  pages: readonly RawSearchItem[],
  maxResults: number,
): RawSearchItem[] {
  const pageSlots = Math.min(pages.length, Math.floor(maxResults / 2));
  const imageItems = images.slice(0, maxResults - pageSlots);
  return [...imageItems, ...pages.slice(0, maxResults - imageItems.length)];
}

export function normalizeTavilyResponse(
  payload: TavilyResponse,
  params: SearchParams,
  options: PrimaryCallOptions,
): RawSearchResult {
  const pages: RawSearchItem[] = payload.results.map((item) => ({
    title: item.title?.trim() || item.url,
    url: item.url,
    snippet: item.content ?? '',
  }));
  const images = toImageItems(payload.images);

  let items: RawSearchItem[];
  if (options.searchType === 'image') {
    items = imagesFirst(images, pages, params.maxResults);
  } else if (params.includeImages) {
    items = [...pages, ...images].slice(0, params.maxResults);
  } else {
    items = pages.slice(0, params.maxResults);
  }

  const answer = payload.answer?.trim();
  return {
    items,
    ...(answer ? { directAnswer: answer } : {}),
  };
}

export function createTavilyProvider(config: TavilyProviderConfig): PrimarySearchProvider {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const fetchImpl = config.fetchImpl ?? fetch;

  if (!config.apiKey) {
    log.warn('TAVILY_API_KEY is not set; every search will go to the fallback provider');
  }

  return {
    name: PROVIDER_NAME,

    async query(
      text: string,
      params: SearchParams,
      options: PrimaryCallOptions,
    ): Promise<RawSearchResult> {
      if (!config.apiKey) {
        throw new ProviderError('Tavily API key is not configured', PROVIDER_NAME, 'auth');
      }

      log.debug({ searchType: options.searchType, depth: params.depth }, 'Executing Tavily search');

      let response: Response;
      try {
        response = await fetchImpl(new URL('/search', baseUrl), {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            authorization: `Bearer ${config.apiKey}`,
          },
          body: JSON.stringify(buildTavilyRequestBody(text, params, options)),
          signal: options.signal,
        });
      } catch (error) {
        throw providerErrorFromFetch(PROVIDER_NAME, error, options.signal);
      }

      if (!response.ok) {
        throw providerErrorFromStatus(PROVIDER_NAME, response.status);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new ParseError(
          'Tavily returned a non-JSON body',
          PROVIDER_NAME,
          error instanceof Error ? error : undefined,
        );
      }

      const parsed = TavilyResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ParseError(
          `Unexpected Tavily payload: ${parsed.error.errors.map((e) => e.message).join('; ')}`,
          PROVIDER_NAME,
        );
      }

      const result = normalizeTavilyResponse(parsed.data, params, options);
      log.debug({ itemCount: result.items.length, hasAnswer: result.directAnswer !== undefined }, 'Tavily search completed');
      return result;
    },
  };
}
