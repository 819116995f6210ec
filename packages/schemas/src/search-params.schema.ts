import { z } from 'zod';

export const SearchTypeSchema = z.enum(['general', 'news', 'image']);

export const SearchDepthSchema = z.enum(['basic', 'advanced']);

export const MAX_RESULTS_LIMIT = 20;

const DomainListSchema = z
  .array(z.string().trim().min(1))
  .default([])
  .transform((domains) => [...new Set(domains.map((d) => d.toLowerCase()))].sort());

export const SearchParamsSchema = z
  .object({
    depth: SearchDepthSchema.default('basic'),
    maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(10),
    includeDomains: DomainListSchema,
    excludeDomains: DomainListSchema,
    language: z
      .string()
      .trim()
      .min(2)
      .max(10)
      .default('en')
      .transform((language) => language.toLowerCase()),
    days: z.number().int().positive().optional(),
    includeImages: z.boolean().default(false),
  })
  .strict();

export const SearchQueryInputSchema = z
  .object({
    text: z.string().trim().min(1, 'Query text must not be empty'),
    type: SearchTypeSchema.default('general'),
    params: SearchParamsSchema.default({}),
    requesterId: z
      .string()
      .trim()
      .default('anonymous')
      .transform((id) => (id.length > 0 ? id : 'anonymous')),
  })
  .strict();

export type SearchParamsInput = z.input<typeof SearchParamsSchema>;
export type SearchQueryInput = z.input<typeof SearchQueryInputSchema>;
