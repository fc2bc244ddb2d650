import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health } from './routes/health.js';
import { createAnalysisRoutes, type AnalysisRoutesDeps } from './routes/analyses.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';

const log = createChildLogger('api:server');

export type AppDeps = AnalysisRoutesDeps;

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
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
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Hemascope API',
        version: '0.1.0',
        description: 'Blood report analysis over a prioritized cascade of language models',
      },
    });
    return c.json(spec);
  });

  app.route('/analyses', createAnalysisRoutes(deps));

  return app;
}
