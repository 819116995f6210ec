import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { ProcessedContent, RawSearchResult } from '@quarry/shared/src/types/search.types.js';
import { cleanText, splitSentences, truncateAtWord } from './text-cleaning.js';

const log = createChildLogger('content:processor');

const DEFAULT_SUMMARY_MAX_CHARS = 300;
const DEFAULT_KEYWORD_COUNT = 5;
const MIN_TOKEN_LENGTH = 3;

const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL('./stopwords.en.json', import.meta.url), 'utf-8'))),
);

/** Optional NLP capability. Higher scores mark more salient sentences. */
export interface EnhancedSummarizer {
  score(text: string): number | Promise<number>;
}

export interface ContentProcessorConfig {
  readonly summaryMaxChars?: number;
  readonly keywordCount?: number;
  readonly summarizer?: EnhancedSummarizer;
}

export interface ProcessOptions {
  readonly language?: string;
}

export interface ContentProcessor {
  process(raw: RawSearchResult, options?: ProcessOptions): Promise<ProcessedContent>;
}

interface Sentence {
  readonly text: string;
  readonly tokens: readonly string[];
  readonly position: number;
}

function stopwordsFor(language: string): ReadonlySet<string> {
  return language.toLowerCase().startsWith('en') ? ENGLISH_STOPWORDS : new Set<string>();
}

export function tokenize(text: string, stopwords: ReadonlySet<string>): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu) ?? [];
  return words.filter((word) => word.length >= MIN_TOKEN_LENGTH && !stopwords.has(word));
}

function termFrequencies(sentences: readonly Sentence[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const sentence of sentences) {
    for (const token of sentence.tokens) {
      frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
    }
  }
  return frequencies;
}

function frequencyScore(sentence: Sentence, frequencies: ReadonlyMap<string, number>): number {
  if (sentence.tokens.length === 0) {
    return 0;
  }
  const total = sentence.tokens.reduce((sum, token) => sum + (frequencies.get(token) ?? 0), 0);
  return total / sentence.tokens.length;
}

// Ties keep the earlier term: Map order is first occurrence and sort is stable.
export function rankKeywords(frequencies: ReadonlyMap<string, number>, count: number): string[] {
  return [...frequencies.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, count)
    .map(([term]) => term);
}

function selectSummary(ranked: readonly Sentence[], maxChars: number): string {
  const selected: Sentence[] = [];
  let length = 0;

  for (const sentence of ranked) {
    const added = sentence.text.length + (selected.length > 0 ? 1 : 0);
    if (length + added <= maxChars) {
      selected.push(sentence);
      length += added;
    }
  }

  if (selected.length === 0) {
    return ranked.length > 0 ? truncateAtWord(ranked[0].text, maxChars) : '';
  }

  return selected
    .sort((a, b) => a.position - b.position)
    .map((sentence) => sentence.text)
    .join(' ');
}

export function createContentProcessor(config: ContentProcessorConfig = {}): ContentProcessor {
  const summaryMaxChars = config.summaryMaxChars ?? DEFAULT_SUMMARY_MAX_CHARS;
  const keywordCount = config.keywordCount ?? DEFAULT_KEYWORD_COUNT;
  const { summarizer } = config;

  async function enhancedWeights(sentences: readonly Sentence[]): Promise<number[] | null> {
    if (!summarizer) {
      return null;
    }
    try {
      const scores = await Promise.all(sentences.map((s) => summarizer.score(s.text)));
      return scores.map((score) => (Number.isFinite(score) && score > 0 ? score : 0));
    } catch (error) {
      log.warn({ error: toError(error).message }, 'Enhanced summarizer failed, using frequency scoring');
      return null;
    }
  }

  return {
    async process(raw: RawSearchResult, options: ProcessOptions = {}): Promise<ProcessedContent> {
      const stopwords = stopwordsFor(options.language ?? 'en');
      const cleanedSnippets = raw.items
        .map((item) => cleanText(item.snippet))
        .filter((snippet) => snippet.length > 0);

      const seen = new Set<string>();
      const sentences: Sentence[] = [];
      for (const snippet of cleanedSnippets) {
        for (const text of splitSentences(snippet)) {
          const fingerprint = text.toLowerCase();
          if (seen.has(fingerprint)) {
            continue;
          }
          seen.add(fingerprint);
          sentences.push({ text, tokens: tokenize(text, stopwords), position: sentences.length });
        }
      }

      if (sentences.length === 0) {
        return { cleanedText: '', summary: '', keywords: [] };
      }

      const frequencies = termFrequencies(sentences);
      const weights = await enhancedWeights(sentences);
      const scored = sentences.map((sentence, index) => ({
        sentence,
        score: frequencyScore(sentence, frequencies) * (1 + (weights ? weights[index] : 0)),
      }));
      const ranked = scored
        .sort((a, b) => b.score - a.score || a.sentence.position - b.sentence.position)
        .map((entry) => entry.sentence);

      return {
        cleanedText: cleanedSnippets.join(' '),
        summary: selectSummary(ranked, summaryMaxChars),
        keywords: rankKeywords(frequencies, keywordCount),
      };
    },
  };
}
