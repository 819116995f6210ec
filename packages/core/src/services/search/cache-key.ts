import { createHash } from 'node:crypto';
import type { SearchQuery } from '@quarry/shared/src/types/search.types.js';

const CACHE_KEY_VERSION = 'v1';

export function normalizeQueryText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

function canonicalDomains(domains: readonly string[]): string[] {
  return [...new Set(domains.map((d) => d.trim().toLowerCase()))].sort();
}

/**
 * Positional JSON tuple of every field that changes what a provider returns.
 * Text differences in case or whitespace collapse; any param difference does not.
 */
export function buildCacheKeyMaterial(query: SearchQuery): string {
  const { params } = query;
  return JSON.stringify([
    CACHE_KEY_VERSION,
    normalizeQueryText(query.text),
    query.type,
    params.depth,
    params.maxResults,
    canonicalDomains(params.includeDomains),
    canonicalDomains(params.excludeDomains),
    params.language.toLowerCase(),
    params.days ?? null,
    params.includeImages,
  ]);
}

export function computeCacheKey(query: SearchQuery): string {
  return createHash('sha256').update(buildCacheKeyMaterial(query)).digest('hex');
}
