import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

const REQUEST_ID_HEADER = 'x-request-id';

export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const id = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
});
