import type { AppConfig } from '@hemascope/schemas/src/config-loader.js';
import { createDocumentValidator } from '@hemascope/ingestion/src/pdf/document-validator.js';
import type { PdfParser } from '@hemascope/ingestion/src/pdf/pdf-parser.js';
import { createReportContentCheck } from '@hemascope/ingestion/src/pdf/report-content-check.js';
import { createTextExtractor } from '@hemascope/ingestion/src/pdf/text-extractor.js';
import { createModelClientFactory, type ModelClientFactory } from '../llm/model-client.js';
import { createModelManager } from '../llm/model-manager.js';
import { createPromptBuilder } from '../prompts/prompt-builder.js';
import type { ChatHistoryRepository } from '../repositories/chat-history.repository.js';
import { createPriorContextResolver } from '../session/prior-context.js';
import { createAnalysisAgent, type AnalysisAgent } from './analysis-agent.js';

export interface AnalysisAgentOverrides {
  readonly clientFactory?: ModelClientFactory;
  readonly chatHistoryRepository?: ChatHistoryRepository;
  readonly parser?: PdfParser;
}

/** Wires every pipeline stage from loaded configuration. */
export async function buildAnalysisAgent(
  config: AppConfig,
  overrides: AnalysisAgentOverrides = {},
): Promise<AnalysisAgent> {
  const { analysis, cascade } = config;

  const modelManager = await createModelManager({
    candidates: cascade.candidates,
    clientFactory: overrides.clientFactory ?? createModelClientFactory(),
    rateLimitBackoffMs: cascade.rateLimitBackoffMs,
  });

  return createAnalysisAgent({
    validator: createDocumentValidator({ maxUploadBytes: analysis.maxUploadBytes }),
    extractor: createTextExtractor({
      maxPageCount: analysis.maxPageCount,
      parser: overrides.parser,
    }),
    contentCheck: createReportContentCheck(analysis.contentScreening),
    promptBuilder: createPromptBuilder({ maxPromptChars: analysis.maxPromptChars }),
    modelManager,
    contextResolver: overrides.chatHistoryRepository
      ? createPriorContextResolver(overrides.chatHistoryRepository, analysis.priorContext)
      : undefined,
  });
}
