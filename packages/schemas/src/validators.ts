import type { ZodError } from 'zod';
import { SchemaValidationError } from '@hemascope/shared/src/utils/errors.js';
import { ModelCascadeSchema } from './model-cascade.schema.js';
import type { ModelCascadeConfig } from './model-cascade.schema.js';
import { AnalysisSchema } from './analysis.schema.js';
import type { AnalysisConfig } from './analysis.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateModelCascadeConfig(data: unknown): ModelCascadeConfig {
  const result = ModelCascadeSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      'Invalid model cascade configuration',
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

export function validateAnalysisConfig(data: unknown): AnalysisConfig {
  const result = AnalysisSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid analysis configuration', formatZodErrors(result.error));
  }

  return result.data;
}
