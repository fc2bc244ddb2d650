import {
  PDF_MEDIA_TYPE,
  type DocumentRejectionReason,
  type UploadedDocument,
  type ValidationResult,
} from '@hemascope/shared/src/types/document.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';

const log = createChildLogger('ingestion:document-validator');

const BYTES_PER_MEGABYTE = 1024 * 1024;

export interface DocumentValidatorConfig {
  readonly maxUploadBytes: number;
  readonly allowedMediaTypes?: readonly string[];
}

export interface DocumentValidator {
  validate(document: UploadedDocument): ValidationResult<DocumentRejectionReason>;
}

function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MEGABYTE).toFixed(1);
}

export function createDocumentValidator(config: DocumentValidatorConfig): DocumentValidator {
  const allowedMediaTypes = config.allowedMediaTypes ?? [PDF_MEDIA_TYPE];
  const limitMb = config.maxUploadBytes / BYTES_PER_MEGABYTE;

  return {
    validate(document: UploadedDocument): ValidationResult<DocumentRejectionReason> {
      if (!allowedMediaTypes.includes(document.mediaType)) {
        log.info({ mediaType: document.mediaType }, 'Rejected document with unsupported type');
        return {
          ok: false,
          reason: 'UnsupportedType',
          message: 'Invalid file type. Please upload a PDF file.',
        };
      }

      const size = Math.max(document.size, document.bytes.byteLength);
      if (size > config.maxUploadBytes) {
        log.info({ size, maxUploadBytes: config.maxUploadBytes }, 'Rejected oversized document');
        return {
          ok: false,
          reason: 'TooLarge',
          message: `File size (${formatMegabytes(size)}MB) exceeds the ${String(limitMb)}MB limit.`,
        };
      }

      if (document.bytes.byteLength === 0) {
        return {
          ok: false,
          reason: 'Empty',
          message: 'The uploaded file is empty. Please upload your blood report again.',
        };
      }

      return { ok: true };
    },
  };
}
