import { z } from 'zod';

const ModelEndpointSchema = z.object({
  provider: z.enum(['vertexai', 'groq']),
  model: z.string().min(1),
  location: z.string().min(1).optional(),
});

export const ModelCandidateSchema = z.object({
  id: z.string().min(1),
  priority: z.number().int().min(0),
  tier: z.enum(['primary', 'secondary', 'tertiary', 'fallback']),
  endpoint: ModelEndpointSchema,
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().min(1).max(32768),
  timeoutMs: z.number().int().min(1),
});

export const ModelCascadeSchema = z
  .object({
    $schema: z.string().optional(),
    rateLimitBackoffMs: z.number().int().min(0).default(2000),
    candidates: z.array(ModelCandidateSchema).min(1),
  })
  .superRefine((cascade, ctx) => {
    const ids = new Set<string>();
    const priorities = new Set<number>();
    cascade.candidates.forEach((candidate, index) => {
      if (ids.has(candidate.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['candidates', index, 'id'],
          message: `Duplicate candidate id "${candidate.id}"`,
        });
      }
      if (priorities.has(candidate.priority)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['candidates', index, 'priority'],
          message: `Duplicate priority ${String(candidate.priority)}`,
        });
      }
      ids.add(candidate.id);
      priorities.add(candidate.priority);
    });
  });

export type ModelCascadeConfig = z.infer<typeof ModelCascadeSchema>;
export type ModelCandidateConfig = z.infer<typeof ModelCandidateSchema>;
