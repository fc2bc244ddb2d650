import { z } from '@hono/zod-openapi';

export const AnalysisHeadersSchema = z.object({
  'x-user-id': z
    .string()
    .min(1)
    .openapi({ description: 'Authenticated user id set by the upstream gateway' }),
});

export const CreateAnalysisFormSchema = z
  .object({
    file: z
      .custom<File>((value) => value instanceof File, { message: 'A PDF file is required' })
      .openapi({ type: 'string', format: 'binary' }),
    sessionId: z.string().min(1).max(128).optional(),
    age: z
      .string()
      .regex(/^\d{1,3}$/, 'Age must be a whole number')
      .transform(Number)
      .optional()
      .openapi({ type: 'string', example: '42' }),
    gender: z.string().trim().min(1).max(32).optional(),
  })
  .openapi('CreateAnalysisRequest');

export type CreateAnalysisForm = z.infer<typeof CreateAnalysisFormSchema>;
