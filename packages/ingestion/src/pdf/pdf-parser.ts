import { createRequire } from 'node:module';
import { pathToFileURL } from 'node:url';

// y-distance (PDF units) between text items that starts a new line
const LINE_BREAK_THRESHOLD = 5;

export interface PdfDocumentHandle {
  readonly pageCount: number;
  /** @param pageIndex 0-based page index */
  readPageText(pageIndex: number): Promise<string>;
  close(): Promise<void>;
}

export interface PdfParser {
  open(bytes: Uint8Array): Promise<PdfDocumentHandle>;
}

let workerConfigured = false;

async function loadPdfjs(): Promise<typeof import('pdfjs-dist/legacy/build/pdf.mjs')> {
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');

  if (!workerConfigured && !pdfjsLib.GlobalWorkerOptions.workerSrc) {
    const require = createRequire(import.meta.url);
    pdfjsLib.GlobalWorkerOptions.workerSrc = pathToFileURL(
      require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs'),
    ).href;
  }
  workerConfigured = true;

  return pdfjsLib;
}

export function createPdfjsParser(): PdfParser {
  return {
    async open(bytes: Uint8Array): Promise<PdfDocumentHandle> {
      const pdfjsLib = await loadPdfjs();

      // pdfjs transfers the buffer to its worker, so hand it a copy
      const loadingTask = pdfjsLib.getDocument({
        data: new Uint8Array(bytes),
        useWorkerFetch: false,
        isEvalSupported: false,
        useSystemFonts: true,
        verbosity: 0,
      });
      const doc = await loadingTask.promise;

      return {
        pageCount: doc.numPages,

        async readPageText(pageIndex: number): Promise<string> {
          const page = await doc.getPage(pageIndex + 1);
          const textContent = await page.getTextContent();

          let lastY: number | null = null;
          const parts: string[] = [];

          for (const item of textContent.items) {
            if (!('str' in item)) continue;
            const y: unknown = item.transform[5];
            const currentY = typeof y === 'number' ? y : null;

            const isNewLine =
              lastY !== null &&
              currentY !== null &&
              Math.abs(currentY - lastY) > LINE_BREAK_THRESHOLD;

            if (isNewLine) {
              parts.push('\n');
            } else if (parts.length > 0) {
              parts.push(' ');
            }

            parts.push(item.str);
            lastY = currentY;
          }

          page.cleanup();
          return parts.join('').trim();
        },

        async close(): Promise<void> {
          await doc.destroy();
        },
      };
    },
  };
}
