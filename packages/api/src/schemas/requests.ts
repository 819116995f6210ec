import { z } from '@hono/zod-openapi';
import { SearchDepthSchema, SearchParamsSchema } from '@quarry/schemas/src/search-params.schema.js';

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const SearchQueryParamsSchema = z
  .object({
    query: z.string().openapi({ example: "today's India news" }),
    requesterId: z.string().optional(),
    searchType: z.string().optional().openapi({ example: 'news' }),
    maxResults: z.coerce.number().int().optional(),
    depth: SearchDepthSchema.optional(),
    days: z.coerce.number().int().optional(),
    language: z.string().optional(),
    includeImages: z
      .enum(['true', 'false'])
      .transform((v) => v === 'true')
      .optional(),
    includeDomains: z.string().transform(splitList).optional(),
    excludeDomains: z.string().transform(splitList).optional(),
  })
  .openapi('SearchQueryParams');

export type SearchQueryParams = z.infer<typeof SearchQueryParamsSchema>;

export const SearchRequestSchema = z
  .object({
    query: z.string(),
    requesterId: z.string().optional(),
    searchType: z.string().optional(),
    params: SearchParamsSchema.optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .openapi('SearchRequest');

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
