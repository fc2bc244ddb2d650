import type { Context } from 'hono';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  HemascopeError,
  PersistenceError,
} from '@hemascope/shared/src/utils/errors.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorResponse = {
      error: 'Could not save the analysis to your session history',
      code: 'PERSISTENCE_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  if (err instanceof ConfigurationError) {
    log.error({ requestId, error: err.message }, 'Configuration error');
    const body: ErrorResponse = {
      error: 'Service is misconfigured',
      code: err.code,
      requestId,
    };
    return c.json(body, 500);
  }

  if (err instanceof HemascopeError) {
    log.error({ requestId, code: err.code, error: err.message }, 'Application error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: err.code,
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
