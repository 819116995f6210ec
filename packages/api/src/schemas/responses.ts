import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Search
const RawSearchItemSchema = z
  .object({
    title: z.string(),
    url: z.string(),
    snippet: z.string(),
  })
  .openapi('RawSearchItem');

export const SearchInsightSchema = z
  .object({
    title: z.string(),
    summary: z.string(),
    keywords: z.array(z.string()),
    url: z.string(),
    directAnswer: z.string().optional(),
    source: z.enum(['primary', 'fallback', 'cache']),
    status: z.enum(['ok', 'no_results', 'stale', 'degraded']),
  })
  .openapi('SearchInsight');

export const SearchResponseSchema = z
  .object({
    reply: z.string(),
    insight: SearchInsightSchema,
    summary: z.string(),
    keywords: z.array(z.string()),
    rawResults: z.array(RawSearchItemSchema),
  })
  .openapi('SearchResponse');
