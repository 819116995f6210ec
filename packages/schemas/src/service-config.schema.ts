import { z } from 'zod';

const CacheConfigSchema = z
  .object({
    maxEntries: z.number().int().min(1).default(500),
    ttlMs: z.number().int().positive().default(10 * 60 * 1000),
    newsTtlMs: z.number().int().positive().default(5 * 60 * 1000),
    graceMs: z.number().int().min(0).default(5 * 60 * 1000),
  })
  .strict();

const ProvidersConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(8000),
    concurrency: z.number().int().min(1).max(64).default(4),
    fallbackMaxResults: z.number().int().min(1).max(20).default(5),
    primaryBaseUrl: z.string().url().default('https://api.tavily.com'),
    fallbackBaseUrl: z.string().url().default('https://api.duckduckgo.com'),
  })
  .strict();

const ContentConfigSchema = z
  .object({
    summaryMaxChars: z.number().int().min(40).default(300),
    keywordCount: z.number().int().min(1).max(20).default(5),
    extractPageText: z.boolean().default(false),
    pageTextMaxResults: z.number().int().min(1).max(10).default(3),
    pageTextTimeoutMs: z.number().int().positive().default(5000),
  })
  .strict();

const SearchBehaviorConfigSchema = z
  .object({
    waitTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const ServiceConfigSchema = z
  .object({
    $schema: z.string().optional(),
    cache: CacheConfigSchema.default({}),
    providers: ProvidersConfigSchema.default({}),
    content: ContentConfigSchema.default({}),
    search: SearchBehaviorConfigSchema.default({}),
  })
  .strict();

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
export type ContentConfig = z.infer<typeof ContentConfigSchema>;
