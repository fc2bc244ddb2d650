import type { AttemptOutcome } from '@hemascope/shared/src/types/analysis.types.js';
import { ModelInvocationError, ModelTimeoutError } from '@hemascope/shared/src/utils/errors.js';

export type FailureOutcome = Exclude<AttemptOutcome, 'success'>;

export interface FailureClassification {
  readonly outcome: FailureOutcome;
  readonly reason: string;
  readonly isRateLimit: boolean;
}

// standalone status codes only, so "maxTokens 1500" is not read as a 500
const TRANSIENT_STATUS_PATTERN = /\b(?:408|429|5\d\d)\b/;
const RATE_LIMIT_STATUS_PATTERN = /\b429\b/;

const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'quota',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'gateway timeout',
  'econnreset',
  'etimedout',
  'timeout',
  'timed out',
  'network',
  'socket hang up',
  'econnrefused',
];

const RATE_LIMIT_PATTERNS = ['rate limit', 'too many requests', 'quota'];

export function extractStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = extractStatusCode(error);
  if (typeof statusCode === 'number') {
    return statusCode === 408 || statusCode === 429 || statusCode >= 500;
  }

  const message = error.message.toLowerCase();
  return (
    TRANSIENT_STATUS_PATTERN.test(message) ||
    TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern))
  );
}

function isRateLimitError(error: unknown): boolean {
  if (extractStatusCode(error) === 429) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return (
    RATE_LIMIT_STATUS_PATTERN.test(message) ||
    RATE_LIMIT_PATTERNS.some((pattern) => message.includes(pattern))
  );
}

/**
 * Maps a failed candidate invocation onto the cascade's failure taxonomy.
 * Both outcomes advance the cascade; the distinction is kept for the attempt trail.
 */
export function classifyFailure(error: unknown): FailureClassification {
  const reason = error instanceof Error ? error.message : String(error);

  if (error instanceof ModelTimeoutError) {
    return { outcome: 'transient_failure', reason, isRateLimit: false };
  }

  const isTransient =
    error instanceof ModelInvocationError ? error.isTransient : isTransientError(error);

  return {
    outcome: isTransient ? 'transient_failure' : 'fatal_failure',
    reason,
    isRateLimit: isRateLimitError(error),
  };
}
