import { createApp } from '../packages/api/src/app.js';
import { createInMemoryUsageLimiter } from '../packages/core/src/usage/usage-limiter.js';

const app = createApp({
  agent: {
    analyze: () => Promise.reject(new Error('The OpenAPI generator does not run analyses')),
  },
  usageLimiter: createInMemoryUsageLimiter({ dailyLimit: 1 }),
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Hemascope API',
    version: '0.1.0',
    description: 'Blood report analysis over a prioritized cascade of language models',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
