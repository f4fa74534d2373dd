/**
 * Invoice Extractor Worker
 *
 * Consumes extract_invoice jobs (one per attachment), extracts the invoice
 * fields and enqueues one export_invoice_row job per document.
 */

import {
  logger,
  config,
  createWorker,
  createQueue,
  reportQueueDepth,
  serveMetrics,
  ExtractionPipeline,
  QUEUE_NAMES,
  type ExtractInvoiceJob,
  type ExportInvoiceRowJob,
} from '@invoicescan/shared';
import { PdfTextAcquirer } from './lib/pdf';
import { TesseractTextAcquirer } from './lib/tesseract';
import { DocumentTextAcquirer } from './lib/acquirer';
import { createExtractInvoiceProcessor } from './lib/processor';

const acquirer = new DocumentTextAcquirer(
  new PdfTextAcquirer(),
  new TesseractTextAcquirer({ binaryPath: config.tesseractPath, timeoutMs: config.ocrTimeoutMs })
);

const pipeline = new ExtractionPipeline({ ocrLanguages: config.ocrLanguages }, acquirer);

const exportRowQueue = createQueue<ExportInvoiceRowJob, void>(QUEUE_NAMES.EXPORT_INVOICE_ROW);
const extractInvoiceQueue = createQueue<ExtractInvoiceJob, void>(QUEUE_NAMES.EXTRACT_INVOICE);

const worker = createWorker<ExtractInvoiceJob, void>(
  QUEUE_NAMES.EXTRACT_INVOICE,
  createExtractInvoiceProcessor({ pipeline, rows: exportRowQueue })
);

const metricsServer = serveMetrics(config.metricsPort);
const depthTimer = setInterval(() => {
  void reportQueueDepth(extractInvoiceQueue);
}, 15000);

logger.info('Invoice extractor worker started', {
  ocr_languages: Array.from(pipeline.ocrLanguages),
  tesseract_path: config.tesseractPath,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  clearInterval(depthTimer);
  metricsServer.close();
  await worker.close();
  await exportRowQueue.close();
  await extractInvoiceQueue.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
