/**
 * PDF Text Extraction
 *
 * Reads the embedded text layer of PDF files with pdfjs-dist. Scanned
 * PDFs without a text layer come back as empty text.
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import {
  logger,
  DocumentAcquisitionError,
  FatalConfigurationError,
  type AcquisitionOptions,
  type TextAcquirer,
} from '@invoicescan/shared';

export interface PageText {
  pageNumber: number;
  text: string;
}

let workerConfigured = false;

/**
 * Point pdfjs at its worker module. A missing worker means the
 * installation is broken for every document, not just this one.
 */
function configureWorker(): void {
  if (workerConfigured) return;

  try {
    pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.js');
    workerConfigured = true;
  } catch (error) {
    throw new FatalConfigurationError('pdfjs-dist worker module is not installed', 'pdfjs-dist', {
      cause: error,
    });
  }
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

/**
 * Rebuild the lines of one page by grouping text items on their Y position.
 */
function pageLines(items: Array<TextItem | TextMarkedContent>): string[] {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!isTextItem(item) || item.str.trim() === '') continue;

    // Round Y position: items on the same visual line vary slightly
    const y = Math.round(Number(item.transform[5]));
    const x = Math.round(Number(item.transform[4]));

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // Top to bottom, then left to right
  return Array.from(itemsByY.keys())
    .sort((a, b) => b - a)
    .map((y) =>
      (itemsByY.get(y) ?? [])
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim()
    )
    .filter((line) => line.length > 0);
}

export async function extractPdfPages(bytes: Uint8Array): Promise<PageText[]> {
  configureWorker();

  // pdfjs takes ownership of the buffer it is given
  const data = new Uint8Array(bytes);

  let pdf: pdfjsLib.PDFDocumentProxy;
  try {
    pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;
  } catch (error) {
    throw new DocumentAcquisitionError('Unreadable PDF', { cause: error });
  }

  try {
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const textContent = await page.getTextContent();
      pages.push({ pageNumber, text: pageLines(textContent.items).join('\n') });
    }
    return pages;
  } catch (error) {
    throw new DocumentAcquisitionError('PDF text extraction failed', { cause: error });
  } finally {
    await pdf.destroy();
  }
}

export class PdfTextAcquirer implements TextAcquirer {
  readonly name = 'pdf';

  async acquire(bytes: Uint8Array, options: AcquisitionOptions): Promise<string> {
    const pages = await extractPdfPages(bytes);
    const text = pages.map((page) => page.text).join('\n\n');

    if (text.trim() === '') {
      logger.warn('PDF has no text layer', {
        document_label: options.label,
        page_count: pages.length,
      });
    } else {
      logger.info('PDF text extraction complete', {
        document_label: options.label,
        page_count: pages.length,
        total_chars: text.length,
      });
    }

    return text;
  }
}
