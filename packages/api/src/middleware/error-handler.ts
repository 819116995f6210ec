import type { Context } from 'hono';
import { ZodError } from 'zod';
import { ValidationError } from '@quarry/shared/src/utils/errors.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof ValidationError) {
    log.debug({ requestId, details: err.validationErrors }, 'Rejected invalid search request');
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
