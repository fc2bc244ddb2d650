import type { ModelCandidate } from '@hemascope/shared/src/types/analysis.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { ConfigurationError, ModelInvocationError } from '@hemascope/shared/src/utils/errors.js';
import { extractStatusCode, isTransientError } from './failure-classifier.js';

const log = createChildLogger('llm:model-client');

export interface ModelRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
}

export interface ModelResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface ModelInvokeOptions {
  readonly signal: AbortSignal;
}

export interface ModelClient {
  invoke(request: ModelRequest, options: ModelInvokeOptions): Promise<ModelResponse>;
}

export type ModelClientFactory = (candidate: ModelCandidate) => Promise<ModelClient>;

interface UsageMetadata {
  readonly input_tokens: number;
  readonly output_tokens: number;
}

function contentToText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) =>
        typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string'
          ? part.text
          : '',
      )
      .join('');
  }
  return '';
}

function toTokenUsage(usage: UsageMetadata | undefined): ModelResponse['tokenUsage'] {
  return usage ? { input: usage.input_tokens, output: usage.output_tokens } : undefined;
}

function toInvocationError(candidate: ModelCandidate, error: unknown): ModelInvocationError {
  if (error instanceof ModelInvocationError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ModelInvocationError(
    `${candidate.endpoint.provider}/${candidate.endpoint.model} invocation failed: ${cause.message}`,
    isTransientError(error),
    extractStatusCode(error),
    cause,
  );
}

const MOCK_SECTIONS: ReadonlyArray<readonly [string, string]> = [
  ['Summary', 'Most measured values fall within their reference ranges.'],
  ['Key Findings', '- LDL cholesterol is above the reference range.\n- Triglycerides are slightly elevated.'],
  ['Potential Risks', '- Elevated LDL is associated with cardiovascular risk over time.'],
  ['Recommendations', '- Discuss dietary changes with your physician.\n- Consider regular physical activity.'],
  ['Follow-up', '- Repeat the lipid panel in 3 months.'],
];

export function createMockModelClient(candidate: ModelCandidate): ModelClient {
  log.info({ candidateId: candidate.id }, 'Using mock model client');

  return {
    invoke(request: ModelRequest): Promise<ModelResponse> {
      log.debug({ candidateId: candidate.id, userMessageLength: request.userMessage.length }, 'Mock model invocation');

      const lines = request.userMessage.split('\n').filter((line) => line.trim() !== '').length;
      const body = MOCK_SECTIONS.map(([title, text]) => `## ${title}\n${text}`).join('\n\n');

      return Promise.resolve({
        content: `${body}\n\n_Report lines reviewed: ${String(lines)}_`,
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

async function createVertexModelClient(candidate: ModelCandidate): Promise<ModelClient> {
  const projectId = process.env['HEMASCOPE_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = candidate.endpoint.location ?? process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';

  if (!projectId) {
    throw new ConfigurationError(
      'HEMASCOPE_GCP_PROJECT_ID environment variable is required for Vertex AI candidates',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: candidate.endpoint.model,
    location,
    temperature: candidate.temperature,
    maxOutputTokens: candidate.maxTokens,
    maxRetries: 0,
    authOptions: { projectId },
  });

  log.info({ candidateId: candidate.id, projectId, location }, 'Using Vertex AI model client');

  return {
    async invoke(request: ModelRequest, options: ModelInvokeOptions): Promise<ModelResponse> {
      try {
        const response = await model.invoke(
          [
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ],
          { signal: options.signal },
        );
        return {
          content: contentToText(response.content),
          tokenUsage: toTokenUsage(response.usage_metadata),
        };
      } catch (error) {
        throw toInvocationError(candidate, error);
      }
    },
  };
}

async function createGroqModelClient(candidate: ModelCandidate): Promise<ModelClient> {
  const apiKey = process.env['GROQ_API_KEY'];

  if (!apiKey) {
    throw new ConfigurationError('GROQ_API_KEY environment variable is required for Groq candidates');
  }

  const { ChatGroq } = await import('@langchain/groq');

  const model = new ChatGroq({
    model: candidate.endpoint.model,
    temperature: candidate.temperature,
    maxTokens: candidate.maxTokens,
    maxRetries: 0,
    apiKey,
  });

  log.info({ candidateId: candidate.id }, 'Using Groq model client');

  return {
    async invoke(request: ModelRequest, options: ModelInvokeOptions): Promise<ModelResponse> {
      try {
        const response = await model.invoke(
          [
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ],
          { signal: options.signal },
        );
        return {
          content: contentToText(response.content),
          tokenUsage: toTokenUsage(response.usage_metadata),
        };
      } catch (error) {
        throw toInvocationError(candidate, error);
      }
    },
  };
}

export function createModelClientFactory(): ModelClientFactory {
  if (process.env['HEMASCOPE_MOCK_LLM'] === 'true') {
    return (candidate) => Promise.resolve(createMockModelClient(candidate));
  }

  return (candidate) => {
    switch (candidate.endpoint.provider) {
      case 'vertexai':
        return createVertexModelClient(candidate);
      case 'groq':
        return createGroqModelClient(candidate);
    }
  };
}
