import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { SearchService } from '@quarry/core/src/services/search/search-service.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health } from './routes/health.js';
import { createSearchRoutes } from './routes/search.js';
import { API_VERSION } from './version.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly searchService: SearchService;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const document = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Quarry API',
        version: API_VERSION,
        description: 'Cached web search with provider fallback and extractive summaries',
      },
    });
    return c.json(document);
  });

  app.route('/search', createSearchRoutes(config.searchService));

  return app;
}
