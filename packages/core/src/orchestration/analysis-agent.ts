import { randomUUID } from 'node:crypto';
import { StateGraph, START, END } from '@langchain/langgraph';
import type { DocumentValidator } from '@hemascope/ingestion/src/pdf/document-validator.js';
import type { ReportContentCheck } from '@hemascope/ingestion/src/pdf/report-content-check.js';
import type { TextExtractor } from '@hemascope/ingestion/src/pdf/text-extractor.js';
import type { AnalysisOutcome } from '@hemascope/shared/src/types/analysis.types.js';
import type {
  PatientProfile,
  UploadedDocument,
} from '@hemascope/shared/src/types/document.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { HemascopeError } from '@hemascope/shared/src/utils/errors.js';
import type { ModelManager } from '../llm/model-manager.js';
import type { PromptBuilder } from '../prompts/prompt-builder.js';
import type { PriorContextResolver } from '../session/prior-context.js';
import { cancelledError } from '../agents/analysis-error.js';
import { createContextNode } from '../agents/context-node.js';
import {
  createExtractionNode,
  createScreeningNode,
  createValidationNode,
} from '../agents/intake-nodes.js';
import { createCascadeNode, createNormalizeNode, createPromptNode } from '../agents/insight-nodes.js';
import {
  AnalysisGraphAnnotation,
  type AnalysisGraphState,
  type AnalysisNode,
} from './analysis-state.js';

const log = createChildLogger('orchestration:analysis');

export interface AnalysisAgentConfig {
  readonly validator: DocumentValidator;
  readonly extractor: TextExtractor;
  readonly contentCheck: ReportContentCheck;
  readonly promptBuilder: PromptBuilder;
  readonly modelManager: ModelManager;
  readonly contextResolver?: PriorContextResolver;
}

export interface AnalysisRequest {
  readonly document: UploadedDocument;
  readonly contextHandle?: string;
  readonly patient?: PatientProfile;
  readonly signal?: AbortSignal;
  readonly requestId?: string;
}

export interface AnalysisAgent {
  analyze(request: AnalysisRequest): Promise<AnalysisOutcome>;
}

function cancellable(node: AnalysisNode): AnalysisNode {
  return (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> =>
    state.abortSignal?.aborted ? Promise.resolve({ error: cancelledError() }) : node(state);
}

function continueTo<T extends string>(next: T): (state: AnalysisGraphState) => T | typeof END {
  return (state: AnalysisGraphState) => (state.error ? END : next);
}

/**
 * One pass over validate, extract, screen, context, prompt, cascade and
 * normalize. Any stage that sets `error` ends the run.
 */
export function createAnalysisAgent(config: AnalysisAgentConfig): AnalysisAgent {
  log.info(
    { candidates: config.modelManager.candidates.length },
    'Initializing analysis agent',
  );

  const graph = new StateGraph(AnalysisGraphAnnotation)
    .addNode('validate', cancellable(createValidationNode(config.validator)))
    .addNode('extract', cancellable(createExtractionNode(config.extractor)))
    .addNode('screen', cancellable(createScreeningNode(config.contentCheck)))
    .addNode('context', cancellable(createContextNode(config.contextResolver)))
    .addNode('buildPrompt', cancellable(createPromptNode(config.promptBuilder)))
    .addNode('cascade', cancellable(createCascadeNode(config.modelManager)))
    .addNode('normalize', createNormalizeNode())
    .addEdge(START, 'validate')
    .addConditionalEdges('validate', continueTo('extract'), { extract: 'extract', [END]: END })
    .addConditionalEdges('extract', continueTo('screen'), { screen: 'screen', [END]: END })
    .addConditionalEdges('screen', continueTo('context'), { context: 'context', [END]: END })
    .addConditionalEdges('context', continueTo('buildPrompt'), {
      buildPrompt: 'buildPrompt',
      [END]: END,
    })
    .addConditionalEdges('buildPrompt', continueTo('cascade'), { cascade: 'cascade', [END]: END })
    .addConditionalEdges('cascade', continueTo('normalize'), {
      normalize: 'normalize',
      [END]: END,
    })
    .addEdge('normalize', END)
    .compile();

  return {
    async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
      const requestId = request.requestId ?? randomUUID();
      log.info(
        {
          requestId,
          size: request.document.size,
          mediaType: request.document.mediaType,
          hasContext: request.contextHandle !== undefined,
        },
        'Running analysis',
      );

      const final = await graph.invoke({
        requestId,
        document: request.document,
        contextHandle: request.contextHandle,
        patient: request.patient,
        abortSignal: request.signal,
        extracted: undefined,
        priorContext: [],
        prompt: undefined,
        cascadeOutcome: undefined,
        result: undefined,
        error: undefined,
      });

      if (final.error) {
        log.info(
          { requestId, kind: final.error.kind, reason: final.error.reason },
          'Analysis failed',
        );
        return { status: 'failed', error: final.error };
      }

      if (!final.result) {
        throw new HemascopeError('Analysis finished without a result', 'INVALID_STATE');
      }

      log.info(
        {
          requestId,
          candidateId: final.result.candidateId,
          attempts: final.result.attempts.length,
          promptTruncated: final.result.promptTruncated,
        },
        'Analysis complete',
      );
      return { status: 'succeeded', result: final.result };
    },
  };
}
