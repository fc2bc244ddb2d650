import type { ExtractedText } from '@hemascope/shared/src/types/document.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { ExtractionError } from '@hemascope/shared/src/utils/errors.js';
import type { PdfDocumentHandle, PdfParser } from './pdf-parser.js';
import { createPdfjsParser } from './pdf-parser.js';

const log = createChildLogger('ingestion:text-extractor');

export interface TextExtractorConfig {
  readonly maxPageCount: number;
  readonly parser?: PdfParser;
}

export interface TextExtractor {
  extract(bytes: Uint8Array): Promise<ExtractedText>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function openDocument(parser: PdfParser, bytes: Uint8Array): Promise<PdfDocumentHandle> {
  try {
    return await parser.open(bytes);
  } catch (error) {
    const cause = toError(error);
    throw new ExtractionError(
      `Could not read the PDF: ${cause.message}`,
      'CorruptDocument',
      cause,
    );
  }
}

export function createTextExtractor(config: TextExtractorConfig): TextExtractor {
  const parser = config.parser ?? createPdfjsParser();

  return {
    async extract(bytes: Uint8Array): Promise<ExtractedText> {
      const document = await openDocument(parser, bytes);

      try {
        if (document.pageCount > config.maxPageCount) {
          throw new ExtractionError(
            `PDF exceeds maximum page limit of ${String(config.maxPageCount)}`,
            'TooManyPages',
          );
        }

        const pages: string[] = [];
        let lastFailure: Error | undefined;
        let failedPages = 0;

        for (let pageIndex = 0; pageIndex < document.pageCount; pageIndex++) {
          try {
            pages.push(await document.readPageText(pageIndex));
          } catch (error) {
            lastFailure = toError(error);
            failedPages++;
            log.warn(
              { page: pageIndex + 1, error: lastFailure.message },
              'Page text extraction failed, continuing with empty page',
            );
            pages.push('');
          }
        }

        if (document.pageCount === 0 || failedPages === document.pageCount) {
          throw new ExtractionError(
            `Could not read the PDF: ${lastFailure?.message ?? 'document has no pages'}`,
            'CorruptDocument',
            lastFailure,
          );
        }

        if (pages.every((page) => page.trim() === '')) {
          throw new ExtractionError(
            "Could not extract text from PDF. Please ensure it's not a scanned document.",
            'NoText',
          );
        }

        log.info(
          { pageCount: document.pageCount, failedPages, characters: pages.join('').length },
          'PDF text extracted',
        );

        return {
          pages,
          text: pages.map((page) => `${page}\n`).join(''),
          pageCount: document.pageCount,
        };
      } finally {
        await document.close();
      }
    },
  };
}
