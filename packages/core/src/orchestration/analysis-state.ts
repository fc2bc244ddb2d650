import { Annotation } from '@langchain/langgraph';
import type {
  AnalysisError,
  AnalysisResult,
  CascadeOutcome,
  Prompt,
} from '@hemascope/shared/src/types/analysis.types.js';
import type { ContextExchange } from '@hemascope/shared/src/types/chat.types.js';
import type {
  ExtractedText,
  PatientProfile,
  UploadedDocument,
} from '@hemascope/shared/src/types/document.types.js';

export const AnalysisGraphAnnotation = Annotation.Root({
  requestId: Annotation<string>,
  document: Annotation<UploadedDocument>,
  contextHandle: Annotation<string | undefined>,
  patient: Annotation<PatientProfile | undefined>,
  abortSignal: Annotation<AbortSignal | undefined>,
  extracted: Annotation<ExtractedText | undefined>,
  priorContext: Annotation<readonly ContextExchange[]>,
  prompt: Annotation<Prompt | undefined>,
  cascadeOutcome: Annotation<CascadeOutcome | undefined>,
  result: Annotation<AnalysisResult | undefined>,
  error: Annotation<AnalysisError | undefined>,
});

export type AnalysisGraphState = typeof AnalysisGraphAnnotation.State;

export type AnalysisNode = (state: AnalysisGraphState) => Promise<Partial<AnalysisGraphState>>;
