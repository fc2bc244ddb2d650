import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { HemascopeError } from '@hemascope/shared/src/utils/errors.js';
import type { ModelManager } from '../llm/model-manager.js';
import type { PromptBuilder } from '../prompts/prompt-builder.js';
import type { AnalysisGraphState, AnalysisNode } from '../orchestration/analysis-state.js';
import { analysisError, cancelledError, NO_MODEL_AVAILABLE_MESSAGE } from './analysis-error.js';
import { parseInsight } from './insight-parser.js';

const log = createChildLogger('agent:insight');

function invalidState(detail: string): HemascopeError {
  return new HemascopeError(`Analysis state is incomplete: ${detail}`, 'INVALID_STATE');
}

export function createPromptNode(promptBuilder: PromptBuilder): AnalysisNode {
  return (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    if (!state.extracted) {
      return Promise.reject(invalidState('no extracted text'));
    }

    const prompt = promptBuilder.build({
      extractedText: state.extracted.text,
      priorContext: state.priorContext,
      patient: state.patient,
    });

    log.debug(
      {
        requestId: state.requestId,
        truncated: prompt.truncated,
        contextExchanges: prompt.contextExchanges,
      },
      'Prompt built',
    );

    return Promise.resolve({ prompt });
  };
}

export function createCascadeNode(modelManager: ModelManager): AnalysisNode {
  return async (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    if (!state.prompt) {
      throw invalidState('no prompt');
    }

    const cascade = await modelManager.invokeCascade(state.prompt, { signal: state.abortSignal });

    switch (cascade.status) {
      case 'succeeded':
        return { cascadeOutcome: cascade };
      case 'exhausted':
        log.warn(
          { requestId: state.requestId, attempts: cascade.attempts.length },
          'Model cascade exhausted',
        );
        return {
          error: analysisError(
            'all_models_failed',
            'CascadeExhausted',
            NO_MODEL_AVAILABLE_MESSAGE,
            cascade.attempts,
          ),
        };
      case 'cancelled':
        return { error: cancelledError() };
    }
  };
}

export function createNormalizeNode(): AnalysisNode {
  return (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    const { cascadeOutcome: cascade, prompt, extracted } = state;
    if (cascade?.status !== 'succeeded' || !prompt || !extracted) {
      return Promise.reject(invalidState('no successful model response'));
    }

    const insight = parseInsight(cascade.content, prompt.responseFormat, prompt.expectedSections);

    if (insight.format === 'sections' && insight.missingSections.length > 0) {
      log.info(
        { requestId: state.requestId, missingSections: insight.missingSections },
        'Model response is missing expected sections',
      );
    }

    return Promise.resolve({
      result: {
        insight,
        candidateId: cascade.candidate.id,
        model: cascade.candidate.endpoint.model,
        attempts: cascade.attempts,
        promptTruncated: prompt.truncated,
        pageCount: extracted.pageCount,
        contextIncluded: prompt.contextExchanges > 0,
      },
    });
  };
}
