/**
 * extract_invoice Job Processor
 *
 * Reads one attachment, runs it through the extraction pipeline and
 * publishes the export row. Kept free of Redis so it can be driven
 * directly in tests.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { UnrecoverableError } from 'bullmq';
import type { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  isFatalConfigurationError,
  toExportRow,
  validateExportRow,
  jobsProcessedCounter,
  jobDurationHistogram,
  QUEUE_NAMES,
  type ExtractionPipeline,
  type ExtractInvoiceJob,
  type ExportInvoiceRowJob,
} from '@invoicescan/shared';

/**
 * Where export rows go (the export_invoice_row queue in production)
 */
export interface RowPublisher {
  add(name: string, data: ExportInvoiceRowJob, opts?: { jobId?: string }): Promise<unknown>;
}

export interface ProcessorDependencies {
  pipeline: ExtractionPipeline;
  rows: RowPublisher;
  readDocument?: (filePath: string) => Promise<Uint8Array>;
  objectStorePath?: string;
}

export type ExtractInvoiceJobLike = Pick<Job<ExtractInvoiceJob, void>, 'id' | 'data' | 'attemptsMade'>;

/**
 * Resolve a raw URI to a local path. Relative paths live in the object store.
 */
export function resolveDocumentPath(rawUri: string, objectStorePath: string): string {
  const filePath = rawUri.startsWith('file://') ? fileURLToPath(rawUri) : rawUri;
  return path.isAbsolute(filePath) ? filePath : path.join(objectStorePath, filePath);
}

export function createExtractInvoiceProcessor(
  deps: ProcessorDependencies
): (job: ExtractInvoiceJobLike) => Promise<void> {
  const readDocument = deps.readDocument ?? ((filePath: string) => fs.promises.readFile(filePath));
  const objectStorePath = deps.objectStorePath ?? config.objectStorePath;

  async function loadBytes(rawUri: string): Promise<Uint8Array> {
    const filePath = resolveDocumentPath(rawUri, objectStorePath);
    try {
      return await readDocument(filePath);
    } catch (error) {
      // Treated like any other unreadable document: the record comes out empty
      logger.warn('Attachment could not be read', {
        file_path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return new Uint8Array(0);
    }
  }

  return async function processExtractInvoice(job: ExtractInvoiceJobLike): Promise<void> {
    const { correlation_id, batch_id, document_label, raw_uri, preferred_client_name } = job.data;

    return runWithContextAsync(
      { correlationId: correlation_id, batchId: batch_id, documentLabel: document_label },
      async () => {
        const startTime = Date.now();

        logger.info('Processing extract_invoice', {
          jobId: job.id,
          attempt: job.attemptsMade + 1,
        });

        try {
          const bytes = await loadBytes(raw_uri);
          const invoice = await deps.pipeline.process(bytes, document_label, preferred_client_name);

          const row = toExportRow(invoice);
          const validation = validateExportRow(row);
          if (!validation.valid) {
            throw new Error(`Export row failed validation: ${(validation.errors ?? []).join('; ')}`);
          }

          const payload: ExportInvoiceRowJob = {
            event_type: 'invoice.extracted',
            correlation_id,
            batch_id,
            document_label,
            row,
          };

          await deps.rows.add(QUEUE_NAMES.EXPORT_INVOICE_ROW, payload, {
            jobId: `row_${batch_id}_${job.id ?? document_label}`.replace(/:/g, '_'),
          });

          logger.info('Enqueued export_invoice_row', { batch_id });

          const duration = (Date.now() - startTime) / 1000;
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_INVOICE, status: 'success' });
          jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_INVOICE, status: 'success' }, duration);
        } catch (error) {
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_INVOICE, status: 'failed' });

          if (isFatalConfigurationError(error)) {
            // Retrying cannot help until the deployment is fixed
            throw new UnrecoverableError(`${error.name}: ${error.message}`);
          }
          throw error;
        }
      }
    );
  };
}
