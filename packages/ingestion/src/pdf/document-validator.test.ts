import { describe, it, expect } from 'vitest';
import type { UploadedDocument } from '@hemascope/shared/src/types/document.types.js';
import { createDocumentValidator } from './document-validator.js';

const MB = 1024 * 1024;

function pdf(bytes: Uint8Array, overrides?: Partial<UploadedDocument>): UploadedDocument {
  return { bytes, mediaType: 'application/pdf', size: bytes.byteLength, ...overrides };
}

describe('createDocumentValidator', () => {
  const validator = createDocumentValidator({ maxUploadBytes: 20 * MB });

  it('should accept a non-empty PDF under the limit', () => {
    expect(validator.validate(pdf(new Uint8Array([0x25, 0x50, 0x44, 0x46])))).toEqual({ ok: true });
  });

  it('should reject non-PDF media types first', () => {
    const result = validator.validate(
      pdf(new Uint8Array(0), { mediaType: 'image/png', size: 30 * MB }),
    );
    expect(result).toEqual({
      ok: false,
      reason: 'UnsupportedType',
      message: 'Invalid file type. Please upload a PDF file.',
    });
  });

  it('should reject a declared size above the limit', () => {
    const result = validator.validate(pdf(new Uint8Array([1]), { size: 25 * MB }));
    expect(result).toEqual({
      ok: false,
      reason: 'TooLarge',
      message: 'File size (25.0MB) exceeds the 20MB limit.',
    });
  });

  it('should reject when the actual bytes exceed the limit even if the declared size does not', () => {
    const small = createDocumentValidator({ maxUploadBytes: 4 });
    const result = small.validate(pdf(new Uint8Array(8), { size: 2 }));
    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason).toBe('TooLarge');
  });

  it('should accept a document exactly at the limit', () => {
    const small = createDocumentValidator({ maxUploadBytes: 4 });
    expect(small.validate(pdf(new Uint8Array(4))).ok).toBe(true);
  });

  it('should reject empty content', () => {
    const result = validator.validate(pdf(new Uint8Array(0)));
    expect(!result.ok && result.reason).toBe('Empty');
  });

  it('should honour a custom allowed media type list', () => {
    const custom = createDocumentValidator({
      maxUploadBytes: MB,
      allowedMediaTypes: ['application/pdf', 'application/x-pdf'],
    });
    expect(custom.validate(pdf(new Uint8Array([1]), { mediaType: 'application/x-pdf' })).ok).toBe(
      true,
    );
  });
});
