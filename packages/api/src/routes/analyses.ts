import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { AnalysisAgent } from '@hemascope/core/src/orchestration/analysis-agent.js';
import type { ChatHistoryRepository } from '@hemascope/core/src/repositories/chat-history.repository.js';
import type { UsageLimiter } from '@hemascope/core/src/usage/usage-limiter.js';
import type {
  AnalysisError,
  AnalysisResult,
  CascadeAttempt,
} from '@hemascope/shared/src/types/analysis.types.js';
import type { PatientProfile } from '@hemascope/shared/src/types/document.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { AnalysisHeadersSchema, CreateAnalysisFormSchema } from '../schemas/requests.js';
import {
  AnalysisErrorResponseSchema,
  AnalysisResponseSchema,
  ErrorResponseSchema,
} from '../schemas/responses.js';

const log = createChildLogger('api:analyses');

export interface AnalysisRoutesDeps {
  readonly agent: AnalysisAgent;
  readonly usageLimiter: UsageLimiter;
  readonly chatHistoryRepository?: ChatHistoryRepository;
}

const analysisFailure = (description: string) => ({
  description,
  content: { 'application/json': { schema: AnalysisErrorResponseSchema } },
});

const createAnalysisRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Analyses'],
  summary: 'Analyse a blood report PDF',
  request: {
    headers: AnalysisHeadersSchema,
    body: {
      required: true,
      content: {
        'multipart/form-data': {
          schema: CreateAnalysisFormSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Structured insight produced by the first model that succeeded',
      content: { 'application/json': { schema: AnalysisResponseSchema } },
    },
    400: {
      description: 'Malformed request',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
    413: analysisFailure('File exceeds the upload limit'),
    415: analysisFailure('File is not a PDF'),
    422: analysisFailure('Document could not be read or is not a blood report'),
    429: {
      description: 'Daily analysis limit reached',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
    503: analysisFailure('No model produced an answer, or the request was cancelled'),
  },
});

function toAttempts(attempts: readonly CascadeAttempt[]) {
  return attempts.map((attempt) => ({ ...attempt }));
}

function toSuccessBody(requestId: string, result: AnalysisResult) {
  const { insight } = result;
  return {
    requestId,
    format: insight.format,
    text: insight.text,
    sections: insight.format === 'sections' ? insight.sections.map((s) => ({ ...s })) : [],
    missingSections: insight.format === 'sections' ? [...insight.missingSections] : [],
    candidateId: result.candidateId,
    model: result.model,
    attempts: toAttempts(result.attempts),
    promptTruncated: result.promptTruncated,
    pageCount: result.pageCount,
    contextIncluded: result.contextIncluded,
  };
}

function toFailureBody(requestId: string, error: AnalysisError) {
  return {
    error: error.message,
    code: error.kind.toUpperCase(),
    requestId,
    kind: error.kind,
    reason: error.reason,
    attempts: toAttempts(error.attempts),
  };
}

function toPatient(age: number | undefined, gender: string | undefined): PatientProfile | undefined {
  if (age === undefined && gender === undefined) {
    return undefined;
  }
  return {
    ...(age !== undefined && { age }),
    ...(gender !== undefined && { gender }),
  };
}

export function createAnalysisRoutes(deps: AnalysisRoutesDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(createAnalysisRoute, async (c) => {
    const requestId = c.get('requestId');
    const { 'x-user-id': userId } = c.req.valid('header');
    const form = c.req.valid('form');

    const usage = deps.usageLimiter.reserve(userId);
    if (!usage.allowed) {
      return c.json(
        {
          error: usage.message,
          code: 'DAILY_LIMIT_REACHED',
          requestId,
        },
        429,
      );
    }

    let committed = false;
    try {
      const outcome = await deps.agent.analyze({
        requestId,
        document: {
          bytes: new Uint8Array(await form.file.arrayBuffer()),
          mediaType: form.file.type,
          size: form.file.size,
          fileName: form.file.name,
        },
        contextHandle: form.sessionId,
        patient: toPatient(form.age, form.gender),
        signal: c.req.raw.signal,
      });

      if (outcome.status === 'failed') {
        const { error } = outcome;
        const body = toFailureBody(requestId, error);
        if (error.kind === 'validation' && error.reason === 'TooLarge') {
          return c.json(body, 413);
        }
        if (error.kind === 'validation' && error.reason === 'UnsupportedType') {
          return c.json(body, 415);
        }
        if (error.kind === 'validation' || error.kind === 'extraction') {
          return c.json(body, 422);
        }
        return c.json(body, 503);
      }

      const { result } = outcome;

      if (form.sessionId && deps.chatHistoryRepository) {
        await deps.chatHistoryRepository.appendMessage(form.sessionId, {
          role: 'user',
          content: `Analyzing report: ${form.file.name || 'report.pdf'}`,
        });
        await deps.chatHistoryRepository.appendMessage(form.sessionId, {
          role: 'assistant',
          content: result.insight.text,
          modelId: result.model,
        });
        log.debug({ requestId, sessionId: form.sessionId }, 'Analysis appended to chat history');
      }

      deps.usageLimiter.commit(userId);
      committed = true;

      return c.json(toSuccessBody(requestId, result), 200);
    } finally {
      if (!committed) {
        deps.usageLimiter.release(userId);
      }
    }
  });

  return routes;
}
