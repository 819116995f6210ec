import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_INCOMING_ID_LENGTH = 128;

export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
  const id =
    incoming && incoming.length <= MAX_INCOMING_ID_LENGTH ? incoming : randomUUID();

  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
});
