import type { DocumentValidator } from '@hemascope/ingestion/src/pdf/document-validator.js';
import type { ReportContentCheck } from '@hemascope/ingestion/src/pdf/report-content-check.js';
import type { TextExtractor } from '@hemascope/ingestion/src/pdf/text-extractor.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { ExtractionError } from '@hemascope/shared/src/utils/errors.js';
import type { AnalysisGraphState, AnalysisNode } from '../orchestration/analysis-state.js';
import { analysisError } from './analysis-error.js';

const log = createChildLogger('agent:intake');

export function createValidationNode(validator: DocumentValidator): AnalysisNode {
  return (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    const verdict = validator.validate(state.document);

    if (!verdict.ok) {
      log.info(
        { requestId: state.requestId, reason: verdict.reason, size: state.document.size },
        'Document rejected',
      );
      return Promise.resolve({
        error: analysisError('validation', verdict.reason, verdict.message),
      });
    }

    return Promise.resolve({});
  };
}

export function createExtractionNode(extractor: TextExtractor): AnalysisNode {
  return async (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    try {
      const extracted = await extractor.extract(state.document.bytes);
      log.info(
        { requestId: state.requestId, pageCount: extracted.pageCount, chars: extracted.text.length },
        'Text extracted',
      );
      return { extracted };
    } catch (error) {
      if (error instanceof ExtractionError) {
        log.info({ requestId: state.requestId, reason: error.reason }, 'Extraction failed');
        return { error: analysisError('extraction', error.reason, error.message) };
      }
      throw error;
    }
  };
}

export function createScreeningNode(contentCheck: ReportContentCheck): AnalysisNode {
  return (state: AnalysisGraphState): Promise<Partial<AnalysisGraphState>> => {
    const verdict = contentCheck.check(state.extracted?.text ?? '');

    if (!verdict.ok) {
      log.info({ requestId: state.requestId, reason: verdict.reason }, 'Report content rejected');
      return Promise.resolve({
        error: analysisError('validation', verdict.reason, verdict.message),
      });
    }

    return Promise.resolve({});
  };
}
