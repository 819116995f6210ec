import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { EnhancedSearchResponse } from '@quarry/shared/src/types/search.types.js';
import type { SearchParamsInput } from '@quarry/schemas/src/search-params.schema.js';
import type { SearchService } from '@quarry/core/src/services/search/search-service.js';
import { toPlainTextReply } from '@quarry/core/src/services/search/search-service.js';
import { createRouter, type AppEnv } from '../types.js';
import { SearchQueryParamsSchema, SearchRequestSchema } from '../schemas/requests.js';
import type { SearchQueryParams } from '../schemas/requests.js';
import { ErrorResponseSchema, SearchResponseSchema } from '../schemas/responses.js';

const searchResponses = {
  200: {
    description: 'Search insight with extractive summary and raw results',
    content: {
      'application/json': {
        schema: SearchResponseSchema,
      },
    },
  },
  400: {
    description: 'Invalid search request',
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
  },
};

const searchGetRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Search'],
  summary: 'Search the web',
  request: {
    query: SearchQueryParamsSchema,
  },
  responses: searchResponses,
});

const searchPostRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Search'],
  summary: 'Search the web with explicit parameters',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SearchRequestSchema,
        },
      },
    },
  },
  responses: searchResponses,
});

function paramsFromQuery(query: SearchQueryParams): SearchParamsInput {
  return {
    maxResults: query.maxResults,
    depth: query.depth,
    days: query.days,
    language: query.language,
    includeImages: query.includeImages,
    includeDomains: query.includeDomains,
    excludeDomains: query.excludeDomains,
  };
}

function toResponseBody(response: EnhancedSearchResponse) {
  const { insight } = response;
  return {
    reply: toPlainTextReply(insight),
    insight: {
      title: insight.title,
      summary: insight.summary,
      keywords: [...insight.keywords],
      url: insight.url,
      ...(insight.directAnswer !== undefined ? { directAnswer: insight.directAnswer } : {}),
      source: insight.source,
      status: insight.status,
    },
    summary: response.summary,
    keywords: [...response.keywords],
    rawResults: response.rawResults.map((item) => ({ ...item })),
  };
}

export function createSearchRoutes(searchService: SearchService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(searchGetRoute, async (c) => {
    const query = c.req.valid('query');

    const response = await searchService.enhancedSearch(
      query.query,
      query.requesterId ?? 'anonymous',
      query.searchType,
      paramsFromQuery(query),
    );

    return c.json(toResponseBody(response), 200);
  });

  routes.openapi(searchPostRoute, async (c) => {
    const body = c.req.valid('json');

    const response = await searchService.enhancedSearch(
      body.query,
      body.requesterId ?? 'anonymous',
      body.searchType,
      body.params ?? {},
      body.timeoutMs !== undefined ? { timeoutMs: body.timeoutMs } : undefined,
    );

    return c.json(toResponseBody(response), 200);
  });

  return routes;
}
