import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Analyses
export const CascadeAttemptSchema = z
  .object({
    candidateId: z.string(),
    model: z.string(),
    outcome: z.enum(['success', 'transient_failure', 'fatal_failure']),
    failureReason: z.string().optional(),
    latencyMs: z.number(),
  })
  .openapi('CascadeAttempt');

export const InsightSectionSchema = z
  .object({
    key: z.string(),
    title: z.string(),
    content: z.string(),
  })
  .openapi('InsightSection');

export const AnalysisResponseSchema = z
  .object({
    requestId: z.string(),
    format: z.enum(['sections', 'free_text']),
    text: z.string(),
    sections: z.array(InsightSectionSchema),
    missingSections: z.array(z.string()),
    candidateId: z.string(),
    model: z.string(),
    attempts: z.array(CascadeAttemptSchema),
    promptTruncated: z.boolean(),
    pageCount: z.number().int(),
    contextIncluded: z.boolean(),
  })
  .openapi('AnalysisResponse');

export const AnalysisErrorResponseSchema = ErrorResponseSchema.extend({
  kind: z.enum(['validation', 'extraction', 'all_models_failed', 'cancelled']),
  reason: z.string(),
  attempts: z.array(CascadeAttemptSchema),
}).openapi('AnalysisErrorResponse');
