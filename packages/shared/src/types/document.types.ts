export const PDF_MEDIA_TYPE = 'application/pdf';

export interface UploadedDocument {
  readonly bytes: Uint8Array;
  readonly mediaType: string;
  readonly size: number;
  readonly fileName?: string;
}

export interface ExtractedText {
  readonly pages: readonly string[];
  readonly text: string;
  readonly pageCount: number;
}

export type DocumentRejectionReason = 'UnsupportedType' | 'TooLarge' | 'Empty';

export type ContentRejectionReason = 'TextTooShort' | 'NotMedicalReport';

export type ValidationResult<R extends string = DocumentRejectionReason> =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: R; readonly message: string };

export interface PatientProfile {
  readonly age?: number;
  readonly gender?: string;
}
