import { serve } from '@hono/node-server';
import { loadConfig } from '@hemascope/schemas/src/config-loader.js';
import { createFirestoreClient } from '@hemascope/core/src/infrastructure/firestore-client.js';
import { createFirestoreChatHistoryRepository } from '@hemascope/core/src/infrastructure/firestore-chat-history.repository.js';
import { createInMemoryChatHistoryRepository } from '@hemascope/core/src/repositories/in-memory-chat-history.repository.js';
import type { ChatHistoryRepository } from '@hemascope/core/src/repositories/chat-history.repository.js';
import { buildAnalysisAgent } from '@hemascope/core/src/orchestration/analysis-agent.factory.js';
import { createInMemoryUsageLimiter } from '@hemascope/core/src/usage/usage-limiter.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

function createChatHistoryRepository(): ChatHistoryRepository {
  if (process.env['HEMASCOPE_GCP_PROJECT_ID']) {
    return createFirestoreChatHistoryRepository(createFirestoreClient());
  }
  log.warn('HEMASCOPE_GCP_PROJECT_ID not set, keeping chat history in memory');
  return createInMemoryChatHistoryRepository();
}

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['CONFIG_DIR'] ?? 'config';

  const config = await loadConfig(configDir);
  const chatHistoryRepository = createChatHistoryRepository();
  const agent = await buildAnalysisAgent(config, { chatHistoryRepository });

  const app = createApp({
    agent,
    usageLimiter: createInMemoryUsageLimiter({ dailyLimit: config.analysis.usage.dailyLimit }),
    chatHistoryRepository,
  });

  log.info({ port, configDir }, 'Starting Hemascope API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Hemascope API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
