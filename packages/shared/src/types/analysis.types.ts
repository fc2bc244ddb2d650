import type { ContentRejectionReason, DocumentRejectionReason } from './document.types.js';
import type { ExtractionFailureReason } from '../utils/errors.js';

export type ModelProvider = 'vertexai' | 'groq';

export type CandidateTier = 'primary' | 'secondary' | 'tertiary' | 'fallback';

export interface ModelEndpoint {
  readonly provider: ModelProvider;
  readonly model: string;
  readonly location?: string;
}

export interface ModelCandidate {
  readonly id: string;
  readonly priority: number;
  readonly tier: CandidateTier;
  readonly endpoint: ModelEndpoint;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly timeoutMs: number;
}

export type ResponseFormat = 'sections' | 'free_text';

export interface Prompt {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly truncated: boolean;
  readonly responseFormat: ResponseFormat;
  readonly expectedSections: readonly string[];
  /** Prior-context exchanges that survived truncation. */
  readonly contextExchanges: number;
}

export type AttemptOutcome = 'success' | 'transient_failure' | 'fatal_failure';

export interface CascadeAttempt {
  readonly candidateId: string;
  readonly model: string;
  readonly outcome: AttemptOutcome;
  readonly failureReason?: string;
  readonly latencyMs: number;
}

export type CascadeOutcome =
  | {
      readonly status: 'succeeded';
      readonly content: string;
      readonly candidate: ModelCandidate;
      readonly attempts: readonly CascadeAttempt[];
    }
  | { readonly status: 'exhausted'; readonly attempts: readonly CascadeAttempt[] }
  | { readonly status: 'cancelled' };

export interface InsightSection {
  readonly key: string;
  readonly title: string;
  readonly content: string;
}

export type InsightPayload =
  | {
      readonly format: 'sections';
      readonly sections: readonly InsightSection[];
      readonly missingSections: readonly string[];
      readonly text: string;
    }
  | { readonly format: 'free_text'; readonly text: string };

export interface AnalysisResult {
  readonly insight: InsightPayload;
  readonly candidateId: string;
  readonly model: string;
  readonly attempts: readonly CascadeAttempt[];
  readonly promptTruncated: boolean;
  readonly pageCount: number;
  readonly contextIncluded: boolean;
}

export type AnalysisErrorKind = 'validation' | 'extraction' | 'all_models_failed' | 'cancelled';

export type AnalysisErrorReason =
  | DocumentRejectionReason
  | ContentRejectionReason
  | ExtractionFailureReason
  | 'CascadeExhausted'
  | 'Cancelled';

export interface AnalysisError {
  readonly kind: AnalysisErrorKind;
  readonly reason: AnalysisErrorReason;
  readonly message: string;
  readonly attempts: readonly CascadeAttempt[];
}

export type AnalysisOutcome =
  | { readonly status: 'succeeded'; readonly result: AnalysisResult }
  | { readonly status: 'failed'; readonly error: AnalysisError };
