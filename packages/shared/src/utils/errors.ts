export class HemascopeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'HemascopeError';
  }
}

export type ExtractionFailureReason = 'CorruptDocument' | 'TooManyPages' | 'NoText';

export class ExtractionError extends HemascopeError {
  constructor(
    message: string,
    public readonly reason: ExtractionFailureReason,
    cause?: Error,
  ) {
    super(message, 'EXTRACTION_ERROR', cause);
    this.name = 'ExtractionError';
  }
}

export class ModelInvocationError extends HemascopeError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, 'MODEL_INVOCATION_ERROR', cause);
    this.name = 'ModelInvocationError';
  }
}

export class ModelTimeoutError extends ModelInvocationError {
  constructor(candidateId: string, timeoutMs: number) {
    super(`Candidate ${candidateId} timed out after ${String(timeoutMs)}ms`, true);
    this.name = 'ModelTimeoutError';
  }
}

export class CancellationError extends HemascopeError {
  constructor(message = 'Analysis was cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancellationError';
  }
}

export class SchemaValidationError extends HemascopeError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends HemascopeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class PersistenceError extends HemascopeError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}
