import { describe, it, expect, vi } from 'vitest';
import { createDocumentValidator } from '@hemascope/ingestion/src/pdf/document-validator.js';
import { createReportContentCheck } from '@hemascope/ingestion/src/pdf/report-content-check.js';
import type { TextExtractor } from '@hemascope/ingestion/src/pdf/text-extractor.js';
import type { ModelCandidate } from '@hemascope/shared/src/types/analysis.types.js';
import type {
  ExtractedText,
  UploadedDocument,
} from '@hemascope/shared/src/types/document.types.js';
import { ExtractionError, ModelInvocationError } from '@hemascope/shared/src/utils/errors.js';
import type { ModelClient, ModelResponse } from '../llm/model-client.js';
import { createModelManager } from '../llm/model-manager.js';
import { createPromptBuilder } from '../prompts/prompt-builder.js';
import { createInMemoryChatHistoryRepository } from '../repositories/in-memory-chat-history.repository.js';
import { createPriorContextResolver } from '../session/prior-context.js';
import { createAnalysisAgent, type AnalysisAgentConfig } from './analysis-agent.js';

const MB = 1024 * 1024;

const REPORT_TEXT =
  'City Laboratory - Blood Test Report\nPatient: Test Person\nHemoglobin 13.5 g/dL (13.0-17.0)\nGlucose 92 mg/dL (70-100)\n';

const RESPONSE = [
  '## Summary',
  'Values are within range.',
  '## Key Findings',
  '- Hemoglobin normal',
  '## Potential Risks',
  'None',
  '## Recommendations',
  '- Keep a balanced diet',
  '## Follow-up',
  '- Annual check',
].join('\n');

const pdf: UploadedDocument = {
  bytes: new Uint8Array([0x25, 0x50, 0x44, 0x46]),
  mediaType: 'application/pdf',
  size: 4,
};

function candidate(id: string, priority: number): ModelCandidate {
  return {
    id,
    priority,
    tier: 'primary',
    endpoint: { provider: 'groq', model: `model-${id}` },
    temperature: 0.7,
    maxTokens: 2000,
    timeoutMs: 30_000,
  };
}

function fakeClient(behaviour: () => Promise<ModelResponse>) {
  return { invoke: vi.fn<ModelClient['invoke']>(behaviour) };
}

function fakeExtractor(result: ExtractedText | Error) {
  return {
    extract: vi.fn<TextExtractor['extract']>(() =>
      result instanceof Error ? Promise.reject(result) : Promise.resolve(result),
    ),
  };
}

const extracted: ExtractedText = { pages: [REPORT_TEXT], text: `${REPORT_TEXT}\n`, pageCount: 1 };

async function setup(
  clients: Record<string, ModelClient>,
  overrides: Partial<AnalysisAgentConfig> = {},
) {
  const ids = Object.keys(clients);
  const modelManager = await createModelManager({
    candidates: ids.map((id, index) => candidate(id, index + 1)),
    clientFactory: (c) => {
      const client = clients[c.id];
      return client ? Promise.resolve(client) : Promise.reject(new Error('missing'));
    },
    rateLimitBackoffMs: 0,
    now: () => 0,
  });
  const extractor = fakeExtractor(extracted);

  const agent = createAnalysisAgent({
    validator: createDocumentValidator({ maxUploadBytes: 20 * MB }),
    extractor,
    contentCheck: createReportContentCheck({
      enabled: true,
      minChars: 50,
      minTermMatches: 3,
      terms: ['blood', 'test', 'report', 'laboratory', 'hemoglobin', 'glucose'],
    }),
    promptBuilder: createPromptBuilder({ maxPromptChars: 24_000 }),
    modelManager,
    ...overrides,
  });

  return { agent, extractor };
}

describe('createAnalysisAgent', () => {
  it('should compile its graph without node names clashing with state channels', async () => {
    const { agent } = await setup({ c1: fakeClient(() => Promise.resolve({ content: RESPONSE })) });

    expect(typeof agent.analyze).toBe('function');
  });

  it('should produce a sectioned insight tagged with the winning candidate', async () => {
    const { agent } = await setup({ c1: fakeClient(() => Promise.resolve({ content: RESPONSE })) });

    const outcome = await agent.analyze({ document: pdf });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    const { result } = outcome;
    expect(result.candidateId).toBe('c1');
    expect(result.model).toBe('model-c1');
    expect(result.pageCount).toBe(1);
    expect(result.promptTruncated).toBe(false);
    expect(result.contextIncluded).toBe(false);
    expect(result.attempts).toEqual([
      { candidateId: 'c1', model: 'model-c1', outcome: 'success', latencyMs: 0 },
    ]);
    expect(result.insight.format).toBe('sections');
    if (result.insight.format !== 'sections') return;
    expect(result.insight.sections.map((s) => s.title)).toEqual([
      'Summary',
      'Key Findings',
      'Potential Risks',
      'Recommendations',
      'Follow-up',
    ]);
    expect(result.insight.missingSections).toEqual([]);
  });

  it('should reject an oversized upload without extracting or invoking a model', async () => {
    const client = fakeClient(() => Promise.resolve({ content: RESPONSE }));
    const { agent, extractor } = await setup({ c1: client });

    const outcome = await agent.analyze({ document: { ...pdf, size: 25 * MB } });

    expect(outcome).toEqual({
      status: 'failed',
      error: {
        kind: 'validation',
        reason: 'TooLarge',
        message: 'File size (25.0MB) exceeds the 20MB limit.',
        attempts: [],
      },
    });
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(client.invoke).not.toHaveBeenCalled();
  });

  it('should short-circuit on an extraction failure', async () => {
    const client = fakeClient(() => Promise.resolve({ content: RESPONSE }));
    const { agent } = await setup(
      { c1: client },
      {
        extractor: fakeExtractor(
          new ExtractionError(
            "Could not extract text from PDF. Please ensure it's not a scanned document.",
            'NoText',
          ),
        ),
      },
    );

    const outcome = await agent.analyze({ document: pdf });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error.kind).toBe('extraction');
    expect(outcome.error.reason).toBe('NoText');
    expect(client.invoke).not.toHaveBeenCalled();
  });

  it('should reject text that does not look like a medical report', async () => {
    const client = fakeClient(() => Promise.resolve({ content: RESPONSE }));
    const text = 'Quarterly invoice for office supplies, paper and printer toner.\n';
    const { agent } = await setup(
      { c1: client },
      { extractor: fakeExtractor({ pages: [text], text, pageCount: 1 }) },
    );

    const outcome = await agent.analyze({ document: pdf });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error.kind).toBe('validation');
    expect(outcome.error.reason).toBe('NotMedicalReport');
    expect(client.invoke).not.toHaveBeenCalled();
  });

  it('should return the third candidate after two failures with a trail of three', async () => {
    const { agent } = await setup({
      c1: fakeClient(() => Promise.reject(new ModelInvocationError('Bad Gateway', true, 502))),
      c2: fakeClient(() => Promise.reject(new ModelInvocationError('Forbidden', false, 403))),
      c3: fakeClient(() => Promise.resolve({ content: RESPONSE })),
    });

    const outcome = await agent.analyze({ document: pdf });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.candidateId).toBe('c3');
    expect(outcome.result.attempts.map((a) => a.outcome)).toEqual([
      'transient_failure',
      'fatal_failure',
      'success',
    ]);
  });

  it('should surface the full trail when every candidate fails', async () => {
    const { agent } = await setup({
      c1: fakeClient(() => Promise.reject(new Error('socket hang up'))),
      c2: fakeClient(() => Promise.resolve({ content: '' })),
    });

    const outcome = await agent.analyze({ document: pdf });

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error.kind).toBe('all_models_failed');
    expect(outcome.error.reason).toBe('CascadeExhausted');
    expect(outcome.error.message).toBe('No model is available right now. Please try again later.');
    expect(outcome.error.attempts.map((a) => a.candidateId)).toEqual(['c1', 'c2']);
  });

  it('should produce byte-identical insights for identical input', async () => {
    const { agent } = await setup({ c1: fakeClient(() => Promise.resolve({ content: RESPONSE })) });

    const first = await agent.analyze({ document: pdf });
    const second = await agent.analyze({ document: pdf });

    expect(first.status).toBe('succeeded');
    if (first.status !== 'succeeded' || second.status !== 'succeeded') return;
    expect(JSON.stringify(second.result.insight)).toBe(JSON.stringify(first.result.insight));
  });

  it('should include prior session context in the system prompt', async () => {
    const repository = createInMemoryChatHistoryRepository();
    await repository.appendMessage('session-1', { role: 'user', content: 'Analyzing report' });
    await repository.appendMessage('session-1', { role: 'assistant', content: 'Earlier answer' });
    const client = fakeClient(() => Promise.resolve({ content: RESPONSE }));
    const { agent } = await setup(
      { c1: client },
      {
        contextResolver: createPriorContextResolver(repository, {
          maxExchanges: 2,
          maxMessageChars: 200,
        }),
      },
    );

    const outcome = await agent.analyze({
      document: pdf,
      contextHandle: 'session-1',
      patient: { age: 54, gender: 'male' },
    });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.contextIncluded).toBe(true);
    const request = client.invoke.mock.calls[0]?.[0];
    expect(request?.systemPrompt).toContain('User: Analyzing report\nAssistant: Earlier answer');
    expect(request?.userMessage.startsWith('## Patient Profile\nAge: 54\nGender: male\n\n')).toBe(
      true,
    );
  });

  describe('cancellation', () => {
    it('should stop during candidate 2 with an empty trail and never reach candidate 3', async () => {
      const controller = new AbortController();
      const c3 = fakeClient(() => Promise.resolve({ content: RESPONSE }));
      const { agent } = await setup({
        c1: fakeClient(() => Promise.reject(new Error('503 service unavailable'))),
        c2: fakeClient(() => {
          controller.abort();
          return new Promise<ModelResponse>(() => undefined);
        }),
        c3,
      });

      const outcome = await agent.analyze({ document: pdf, signal: controller.signal });

      expect(outcome).toEqual({
        status: 'failed',
        error: {
          kind: 'cancelled',
          reason: 'Cancelled',
          message: 'The analysis was cancelled before it completed.',
          attempts: [],
        },
      });
      expect(c3.invoke).not.toHaveBeenCalled();
    });

    it('should not start work for an already aborted request', async () => {
      const { agent, extractor } = await setup({
        c1: fakeClient(() => Promise.resolve({ content: RESPONSE })),
      });

      const outcome = await agent.analyze({ document: pdf, signal: AbortSignal.abort() });

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error.kind).toBe('cancelled');
      expect(extractor.extract).not.toHaveBeenCalled();
    });
  });
});
