import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { RawSearchResult } from '@quarry/shared/src/types/search.types.js';
import type { WorkerPool } from '../search/worker-pool.js';
import { cleanText } from './text-cleaning.js';

const log = createChildLogger('content:page-text');

const MAX_PAGE_TEXT_CHARS = 4000;

export interface PageTextFetcherConfig {
  readonly pool: WorkerPool;
  readonly timeoutMs: number;
  readonly fetchImpl?: typeof fetch;
}

export interface PageTextFetcher {
  /** Visible text of the page, or an empty string when it cannot be read. */
  fetchText(url: string): Promise<string>;
}

export function createPageTextFetcher(config: PageTextFetcherConfig): PageTextFetcher {
  const fetchImpl = config.fetchImpl ?? fetch;

  return {
    async fetchText(url: string): Promise<string> {
      try {
        const html = await config.pool.run(
          async (signal) => {
            const response = await fetchImpl(url, { signal, headers: { Accept: 'text/html' } });
            if (!response.ok) {
              throw new Error(`HTTP ${String(response.status)}`);
            }
            return response.text();
          },
          { timeoutMs: config.timeoutMs, label: 'page-text' },
        );
        return cleanText(html).slice(0, MAX_PAGE_TEXT_CHARS);
      } catch (error) {
        log.debug({ url, error: toError(error).message }, 'Page text extraction failed');
        return '';
      }
    },
  };
}

/** Appends page text to the snippets of the first `maxResults` items. */
export async function enrichWithPageText(
  raw: RawSearchResult,
  fetcher: PageTextFetcher,
  maxResults: number,
): Promise<RawSearchResult> {
  const items = await Promise.all(
    raw.items.map(async (item, index) => {
      if (index >= maxResults || !item.url) {
        return item;
      }
      const pageText = await fetcher.fetchText(item.url);
      return pageText ? { ...item, snippet: `${item.snippet} ${pageText}`.trim() } : item;
    }),
  );
  return { ...raw, items };
}
