import { describe, it, expect, vi } from 'vitest';
import type { PdfParser } from '@hemascope/ingestion/src/pdf/pdf-parser.js';
import { freezeCandidates, type AppConfig } from '@hemascope/schemas/src/config-loader.js';
import { validateAnalysisConfig } from '@hemascope/schemas/src/validators.js';
import { createMockModelClient } from '../llm/model-client.js';
import { createInMemoryChatHistoryRepository } from '../repositories/in-memory-chat-history.repository.js';
import { buildAnalysisAgent } from './analysis-agent.factory.js';

const PAGES = [
  'Northside Laboratory\nBlood Test Report\nPatient ID 0001',
  'Hemoglobin 14.1 g/dL reference range 13.0-17.0\nGlucose 88 mg/dL reference range 70-100',
];

const config: AppConfig = {
  cascade: {
    rateLimitBackoffMs: 0,
    candidates: freezeCandidates([
      {
        id: 'fallback',
        priority: 2,
        tier: 'fallback',
        endpoint: { provider: 'groq', model: 'gemma-7b-it' },
        temperature: 0.7,
        maxTokens: 2000,
        timeoutMs: 1000,
      },
      {
        id: 'primary',
        priority: 1,
        tier: 'primary',
        endpoint: { provider: 'groq', model: 'llama-3.3-70b-versatile' },
        temperature: 0.7,
        maxTokens: 2000,
        timeoutMs: 1000,
      },
    ]),
  },
  analysis: validateAnalysisConfig({
    contentScreening: { terms: ['blood', 'test', 'report', 'laboratory', 'hemoglobin'] },
  }),
};

function fakeParser() {
  const close = vi.fn<() => Promise<void>>(() => Promise.resolve());
  const parser: PdfParser = {
    open: () =>
      Promise.resolve({
        pageCount: PAGES.length,
        readPageText: (pageIndex: number) => Promise.resolve(PAGES[pageIndex] ?? ''),
        close,
      }),
  };
  return { parser, close };
}

describe('buildAnalysisAgent', () => {
  it('should wire extraction, prompt and cascade from configuration', async () => {
    const { parser, close } = fakeParser();
    const agent = await buildAnalysisAgent(config, {
      parser,
      clientFactory: (candidate) => Promise.resolve(createMockModelClient(candidate)),
      chatHistoryRepository: createInMemoryChatHistoryRepository(),
    });

    const outcome = await agent.analyze({
      document: { bytes: new Uint8Array([1, 2, 3]), mediaType: 'application/pdf', size: 3 },
      contextHandle: 'empty-session',
    });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.candidateId).toBe('primary');
    expect(outcome.result.pageCount).toBe(2);
    expect(outcome.result.contextIncluded).toBe(false);
    expect(outcome.result.insight.format).toBe('sections');
    if (outcome.result.insight.format !== 'sections') return;
    expect(outcome.result.insight.missingSections).toEqual([]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should record candidates whose client cannot be built as unavailable', async () => {
    const agent = await buildAnalysisAgent(config, {
      parser: fakeParser().parser,
      clientFactory: (candidate) =>
        candidate.id === 'primary'
          ? Promise.reject(new Error('GROQ_API_KEY environment variable is required'))
          : Promise.resolve(createMockModelClient(candidate)),
    });

    const outcome = await agent.analyze({
      document: { bytes: new Uint8Array([1]), mediaType: 'application/pdf', size: 1 },
    });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.attempts.map((a) => [a.candidateId, a.outcome, a.failureReason])).toEqual([
      ['primary', 'fatal_failure', 'client unavailable'],
      ['fallback', 'success', undefined],
    ]);
  });
});
