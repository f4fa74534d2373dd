/**
 * Batch Extraction
 *
 * Runs the pipeline over every document of one submission and collects
 * the records for a single export. One bad document never aborts the
 * batch; a FatalConfigurationError does.
 */

import type { ExtractedInvoice, InvoiceBatchResult } from '../types';
import { toExportRow } from '../types';
import { logger } from '../logger';
import type { ExtractionPipeline } from './pipeline';

export interface BatchDocument {
  label: string;
  bytes: Uint8Array;
}

export interface BatchOptions {
  /** Trusted client name (e.g. the form respondent) applied to every record */
  clientName?: string;
}

export async function extractInvoiceBatch(
  pipeline: ExtractionPipeline,
  documents: readonly BatchDocument[],
  options: BatchOptions = {}
): Promise<InvoiceBatchResult> {
  const records: ExtractedInvoice[] = [];

  for (const document of documents) {
    records.push(await pipeline.process(document.bytes, document.label, options.clientName));
  }

  if (records.length === 0) {
    logger.warn('No invoice data extracted', { document_count: documents.length });
    return { status: 'no_data_extracted', records, rows: [] };
  }

  logger.info('Batch extracted', { document_count: documents.length });

  return {
    status: 'ok',
    records,
    rows: records.map(toExportRow),
  };
}
