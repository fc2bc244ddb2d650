import { z } from 'zod';

const MEGABYTE = 1024 * 1024;

const ContentScreeningSchema = z.object({
  enabled: z.boolean().default(true),
  minChars: z.number().int().min(0).default(50),
  minTermMatches: z.number().int().min(0).default(3),
  terms: z.array(z.string().min(1)).min(1),
});

const PriorContextSchema = z.object({
  maxExchanges: z.number().int().min(0).max(10).default(2),
  maxMessageChars: z.number().int().min(4).default(200),
});

const UsageSchema = z.object({
  dailyLimit: z.number().int().min(1).default(15),
});

export const AnalysisSchema = z.object({
  $schema: z.string().optional(),
  maxUploadBytes: z
    .number()
    .int()
    .min(1)
    .default(20 * MEGABYTE),
  maxPageCount: z.number().int().min(1).default(50),
  maxPromptChars: z.number().int().min(1000).default(24000),
  contentScreening: ContentScreeningSchema,
  priorContext: PriorContextSchema.default({}),
  usage: UsageSchema.default({}),
});

export type AnalysisConfig = z.infer<typeof AnalysisSchema>;
export type ContentScreeningConfig = z.infer<typeof ContentScreeningSchema>;
export type PriorContextConfig = z.infer<typeof PriorContextSchema>;
export type UsageConfig = z.infer<typeof UsageSchema>;
