import type { ZodError } from 'zod';
import { SchemaValidationError, ValidationError } from '@quarry/shared/src/utils/errors.js';
import type { SearchParams, SearchQuery } from '@quarry/shared/src/types/search.types.js';
import { SearchParamsSchema, SearchQueryInputSchema } from './search-params.schema.js';
import { ServiceConfigSchema } from './service-config.schema.js';
import type { ServiceConfig } from './service-config.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateServiceConfig(data: unknown): ServiceConfig {
  const result = ServiceConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid service configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateSearchParams(data: unknown): SearchParams {
  const result = SearchParamsSchema.safeParse(data ?? {});

  if (!result.success) {
    throw new ValidationError('Invalid search parameters', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateSearchQuery(data: unknown): SearchQuery {
  const result = SearchQueryInputSchema.safeParse(data);

  if (!result.success) {
    throw new ValidationError('Invalid search query', formatZodErrors(result.error));
  }

  return result.data;
}
