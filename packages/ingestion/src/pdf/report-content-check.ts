import type {
  ContentRejectionReason,
  ValidationResult,
} from '@hemascope/shared/src/types/document.types.js';
import type { ContentScreeningConfig } from '@hemascope/schemas/src/analysis.schema.js';

export interface ReportContentCheck {
  check(text: string): ValidationResult<ContentRejectionReason>;
}

export function createReportContentCheck(config: ContentScreeningConfig): ReportContentCheck {
  const terms = config.terms.map((term) => term.toLowerCase());

  return {
    check(text: string): ValidationResult<ContentRejectionReason> {
      if (!config.enabled) {
        return { ok: true };
      }

      if (text.trim().length < config.minChars) {
        return {
          ok: false,
          reason: 'TextTooShort',
          message: 'Extracted text is too short. Please ensure the PDF contains valid text.',
        };
      }

      const lower = text.toLowerCase();
      const matches = terms.filter((term) => lower.includes(term)).length;
      if (matches < config.minTermMatches) {
        return {
          ok: false,
          reason: 'NotMedicalReport',
          message:
            "The uploaded file doesn't appear to be a medical report. Please upload a valid blood report.",
        };
      }

      return { ok: true };
    },
  };
}
