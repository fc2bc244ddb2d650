import type {
  AnalysisError,
  AnalysisErrorKind,
  AnalysisErrorReason,
  CascadeAttempt,
} from '@hemascope/shared/src/types/analysis.types.js';

export const NO_MODEL_AVAILABLE_MESSAGE = 'No model is available right now. Please try again later.';
export const CANCELLED_MESSAGE = 'The analysis was cancelled before it completed.';

export function analysisError(
  kind: AnalysisErrorKind,
  reason: AnalysisErrorReason,
  message: string,
  attempts: readonly CascadeAttempt[] = [],
): AnalysisError {
  return { kind, reason, message, attempts };
}

export function cancelledError(): AnalysisError {
  return analysisError('cancelled', 'Cancelled', CANCELLED_MESSAGE);
}
