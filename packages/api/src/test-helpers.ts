import type { AnalysisAgent } from '@hemascope/core/src/orchestration/analysis-agent.js';
import { createInMemoryChatHistoryRepository } from '@hemascope/core/src/repositories/in-memory-chat-history.repository.js';
import type { ChatHistoryRepository } from '@hemascope/core/src/repositories/chat-history.repository.js';
import { createInMemoryUsageLimiter, type UsageLimiter } from '@hemascope/core/src/usage/usage-limiter.js';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_USER_ID = 'test-user';

export interface TestAppOptions {
  readonly usageLimiter?: UsageLimiter;
  readonly chatHistoryRepository?: ChatHistoryRepository;
}

/**
 * Creates the app around a provided agent with in-memory collaborators.
 * For use in unit tests only.
 */
export function createTestApp(
  agent: AnalysisAgent,
  options: TestAppOptions = {},
): OpenAPIHono<AppEnv> {
  return createApp({
    agent,
    usageLimiter: options.usageLimiter ?? createInMemoryUsageLimiter({ dailyLimit: 15 }),
    chatHistoryRepository: options.chatHistoryRepository ?? createInMemoryChatHistoryRepository(),
  });
}

export function pdfForm(
  fields: Record<string, string> = {},
  file: Blob | null = new Blob(['%PDF-1.4 test'], { type: 'application/pdf' }),
  fileName = 'report.pdf',
): FormData {
  const form = new FormData();
  if (file) {
    form.append('file', file, fileName);
  }
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  return form;
}
