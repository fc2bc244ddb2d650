import { describe, it, expect } from 'vitest';
import { validateAnalysisConfig, validateModelCascadeConfig } from './validators.js';
import { SchemaValidationError } from '@hemascope/shared/src/utils/errors.js';

const validCandidate = {
  id: 'groq-llama-70b',
  priority: 0,
  tier: 'primary',
  endpoint: { provider: 'groq', model: 'llama-3.3-70b-versatile' },
  temperature: 0.7,
  maxTokens: 2000,
  timeoutMs: 30000,
};

describe('validateModelCascadeConfig', () => {
  it('should accept a valid cascade and default the rate-limit backoff', () => {
    const result = validateModelCascadeConfig({ candidates: [validCandidate] });
    expect(result.candidates).toHaveLength(1);
    expect(result.rateLimitBackoffMs).toBe(2000);
  });

  it('should reject an empty candidate list', () => {
    expect(() => validateModelCascadeConfig({ candidates: [] })).toThrow(SchemaValidationError);
  });

  it('should reject an unknown provider', () => {
    const invalid = {
      candidates: [{ ...validCandidate, endpoint: { provider: 'openai', model: 'gpt' } }],
    };
    expect(() => validateModelCascadeConfig(invalid)).toThrow(SchemaValidationError);
  });

  it('should reject duplicate priorities', () => {
    const invalid = {
      candidates: [validCandidate, { ...validCandidate, id: 'groq-llama-8b' }],
    };

    try {
      validateModelCascadeConfig(invalid);
      expect.fail('Expected SchemaValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      const validationError = error as SchemaValidationError;
      expect(validationError.validationErrors).toEqual(['candidates.1.priority: Duplicate priority 0']);
    }
  });

  it('should reject duplicate candidate ids', () => {
    const invalid = {
      candidates: [validCandidate, { ...validCandidate, priority: 1 }],
    };

    try {
      validateModelCascadeConfig(invalid);
      expect.fail('Expected SchemaValidationError');
    } catch (error) {
      const validationError = error as SchemaValidationError;
      expect(validationError.validationErrors).toEqual([
        'candidates.1.id: Duplicate candidate id "groq-llama-70b"',
      ]);
    }
  });

  it('should reject a non-positive timeout', () => {
    const invalid = { candidates: [{ ...validCandidate, timeoutMs: 0 }] };
    expect(() => validateModelCascadeConfig(invalid)).toThrow(SchemaValidationError);
  });
});

describe('validateAnalysisConfig', () => {
  const validAnalysis = {
    contentScreening: { terms: ['blood', 'glucose', 'hemoglobin'] },
  };

  it('should fill in the documented defaults', () => {
    const result = validateAnalysisConfig(validAnalysis);
    expect(result.maxUploadBytes).toBe(20 * 1024 * 1024);
    expect(result.maxPageCount).toBe(50);
    expect(result.contentScreening.minChars).toBe(50);
    expect(result.contentScreening.minTermMatches).toBe(3);
    expect(result.contentScreening.enabled).toBe(true);
    expect(result.priorContext).toEqual({ maxExchanges: 2, maxMessageChars: 200 });
    expect(result.usage.dailyLimit).toBe(15);
  });

  it('should reject a screening config without terms', () => {
    const invalid = { contentScreening: { terms: [] } };
    expect(() => validateAnalysisConfig(invalid)).toThrow(SchemaValidationError);
  });

  it('should reject a prompt cap that cannot hold any report', () => {
    const invalid = { ...validAnalysis, maxPromptChars: 10 };
    expect(() => validateAnalysisConfig(invalid)).toThrow(SchemaValidationError);
  });
});
