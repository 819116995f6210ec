import { z } from 'zod';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ParseError } from '@quarry/shared/src/utils/errors.js';
import type { RawSearchItem, RawSearchResult } from '@quarry/shared/src/types/search.types.js';
import type { FallbackCallOptions, FallbackSearchProvider } from './types.js';
import { providerErrorFromFetch, providerErrorFromStatus } from './http-failures.js';

const log = createChildLogger('web-search:duckduckgo');

const PROVIDER_NAME = 'duckduckgo';
const DEFAULT_BASE_URL = 'https://api.duckduckgo.com';
const MAX_TITLE_LENGTH = 80;

const TopicSchema = z
  .object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
  })
  .passthrough();

// Related topics are either plain entries or named groups of entries.
const RelatedTopicSchema = TopicSchema.extend({
  Name: z.string().optional(),
  Topics: z.array(TopicSchema).optional(),
});

const InstantAnswerSchema = z
  .object({
    Heading: z.string().optional(),
    AbstractText: z.string().optional(),
    AbstractURL: z.string().optional(),
    Answer: z.unknown().optional(),
    RelatedTopics: z.array(RelatedTopicSchema).default([]),
  })
  .passthrough();

type InstantAnswer = z.infer<typeof InstantAnswerSchema>;
type Topic = z.infer<typeof TopicSchema>;

export interface DuckDuckGoProviderConfig {
  readonly baseUrl?: string;
  readonly fetchImpl?: typeof fetch;
}

function titleFromTopicText(text: string): string {
  const head = text.split(' - ')[0].trim();
  return head.length > MAX_TITLE_LENGTH ? `${head.slice(0, MAX_TITLE_LENGTH - 3)}...` : head;
}

function flattenTopics(related: InstantAnswer['RelatedTopics']): Topic[] {
  const topics: Topic[] = [];
  for (const entry of related) {
    if (entry.Topics) {
      topics.push(...entry.Topics);
    } else {
      topics.push(entry);
    }
  }
  return topics;
}

export function normalizeInstantAnswer(payload: InstantAnswer, maxResults: number): RawSearchResult {
  const items: RawSearchItem[] = [];
  const abstractText = payload.AbstractText?.trim() ?? '';
  const abstractUrl = payload.AbstractURL?.trim() ?? '';

  if (abstractText && abstractUrl) {
    items.push({
      title: payload.Heading?.trim() || abstractUrl,
      url: abstractUrl,
      snippet: abstractText,
    });
  }

  for (const topic of flattenTopics(payload.RelatedTopics)) {
    const text = topic.Text?.trim();
    const url = topic.FirstURL?.trim();
    if (!text || !url) {
      continue;
    }
    items.push({ title: titleFromTopicText(text), url, snippet: text });
  }

  const answer = typeof payload.Answer === 'string' ? payload.Answer.trim() : '';
  const directAnswer = answer || abstractText;

  return {
    items: items.slice(0, maxResults),
    ...(directAnswer ? { directAnswer } : {}),
  };
}

export function createDuckDuckGoProvider(
  config: DuckDuckGoProviderConfig = {},
): FallbackSearchProvider {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const fetchImpl = config.fetchImpl ?? fetch;

  return {
    name: PROVIDER_NAME,

    async query(text: string, options: FallbackCallOptions): Promise<RawSearchResult> {
      const url = new URL('/', baseUrl);
      url.search = new URLSearchParams({
        q: text,
        format: 'json',
        no_html: '1',
        skip_disambig: '1',
      }).toString();

      log.debug({ maxResults: options.maxResults }, 'Executing DuckDuckGo instant answer lookup');

      let response: Response;
      try {
        response = await fetchImpl(url, {
          headers: { Accept: 'application/json' },
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
          'DuckDuckGo returned a non-JSON body',
          PROVIDER_NAME,
          error instanceof Error ? error : undefined,
        );
      }

      const parsed = InstantAnswerSchema.safeParse(body);
      if (!parsed.success) {
        throw new ParseError('Unexpected DuckDuckGo payload', PROVIDER_NAME);
      }

      return normalizeInstantAnswer(parsed.data, options.maxResults);
    },
  };
}
