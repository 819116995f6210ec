import { describe, it, expect, vi } from 'vitest';
import type { RawSearchResult } from '@quarry/shared/src/types/search.types.js';
import { createContentProcessor, rankKeywords, tokenize } from './content-processor.js';

const solarResult: RawSearchResult = {
  items: [
    {
      title: 'A',
      url: 'https://a.example',
      snippet: 'Solar storms disrupt radio signals. Solar storms also create bright auroras.',
    },
    {
      title: 'B',
      url: 'https://b.example',
      snippet: '<p>Auroras appear near the poles.</p>',
    },
  ],
};

describe('ContentProcessor', () => {
  it('should clean, summarize and extract keywords', async () => {
    const processor = createContentProcessor();
    const processed = await processor.process(solarResult);

    expect(processed.cleanedText).toBe(
      'Solar storms disrupt radio signals. Solar storms also create bright auroras. Auroras appear near the poles.',
    );
    expect(processed.summary).toBe(
      'Solar storms disrupt radio signals. Solar storms also create bright auroras. Auroras appear near the poles.',
    );
    expect(processed.keywords).toEqual(['solar', 'storms', 'auroras', 'disrupt', 'radio']);
  });

  it('should keep the highest scoring sentences that fit the budget, in original order', async () => {
    const processor = createContentProcessor({ summaryMaxChars: 80 });
    const processed = await processor.process(solarResult);

    expect(processed.summary).toBe(
      'Solar storms disrupt radio signals. Solar storms also create bright auroras.',
    );
  });

  it('should truncate the top sentence when nothing fits', async () => {
    const processor = createContentProcessor({ summaryMaxChars: 20 });
    const processed = await processor.process(solarResult);

    expect(processed.summary).toBe('Solar storms...');
  });

  it('should bound the keyword count', async () => {
    const processor = createContentProcessor({ keywordCount: 2 });
    const processed = await processor.process(solarResult);

    expect(processed.keywords).toEqual(['solar', 'storms']);
  });

  it('should weight sentences by the enhanced summarizer when available', async () => {
    const summarizer = {
      score: vi.fn((text: string) => (text.includes('poles') ? 5 : 0)),
    };
    const processor = createContentProcessor({ summaryMaxChars: 80, summarizer });
    const processed = await processor.process(solarResult);

    expect(summarizer.score).toHaveBeenCalledTimes(3);
    expect(processed.summary).toBe(
      'Solar storms also create bright auroras. Auroras appear near the poles.',
    );
  });

  it('should fall back to frequency scoring when the summarizer throws', async () => {
    const processor = createContentProcessor({
      summaryMaxChars: 80,
      summarizer: {
        score: () => Promise.reject(new Error('model not loaded')),
      },
    });
    const processed = await processor.process(solarResult);

    expect(processed.summary).toBe(
      'Solar storms disrupt radio signals. Solar storms also create bright auroras.',
    );
    expect(processed.keywords).toEqual(['solar', 'storms', 'auroras', 'disrupt', 'radio']);
  });

  it('should return empty content for an empty item list', async () => {
    const processor = createContentProcessor();
    const processed = await processor.process({ items: [] });

    expect(processed).toEqual({ cleanedText: '', summary: '', keywords: [] });
  });

  it('should ignore repeated sentences', async () => {
    const processor = createContentProcessor();
    const processed = await processor.process({
      items: [
        { title: 'x', url: 'https://x.example', snippet: 'Rivers flood. Rivers flood.' },
        { title: 'y', url: 'https://y.example', snippet: 'rivers flood.' },
      ],
    });

    expect(processed.summary).toBe('Rivers flood.');
    expect(processed.keywords).toEqual(['rivers', 'flood']);
  });

  it('should only apply English stopwords to English queries', async () => {
    const processor = createContentProcessor();
    const raw: RawSearchResult = {
      items: [{ title: 't', url: 'https://t.example', snippet: 'The moon and the tide.' }],
    };

    expect((await processor.process(raw, { language: 'en' })).keywords).toEqual(['moon', 'tide']);
    expect((await processor.process(raw, { language: 'fr' })).keywords).toEqual([
      'the',
      'moon',
      'and',
      'tide',
    ]);
  });
});

describe('tokenize', () => {
  it('should keep apostrophes inside words and drop short tokens', () => {
    expect(tokenize("Today's India news is up", new Set(['is']))).toEqual([
      "today's",
      'india',
      'news',
    ]);
  });
});

describe('rankKeywords', () => {
  it('should order by frequency and keep first occurrence on ties', () => {
    const frequencies = new Map([
      ['beta', 1],
      ['alpha', 3],
      ['gamma', 1],
    ]);
    expect(rankKeywords(frequencies, 2)).toEqual(['alpha', 'beta']);
  });
});
