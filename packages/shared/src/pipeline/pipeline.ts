/**
 * Extraction Pipeline
 *
 * Wraps text acquisition and the field extractor so that every document
 * yields exactly one ExtractedInvoice. The only failure that escapes is
 * FatalConfigurationError.
 */

import type { ExtractedInvoice } from '../types';
import { InvoiceFieldExtractor, invoiceFieldExtractor } from '../extractors';
import { logger } from '../logger';
import { runForDocument } from '../context';
import { documentsProcessedCounter, extractionDurationHistogram } from '../metrics';
import type { TextAcquirer } from './acquisition';
import { classifyAcquisitionFailure } from './acquisition';

export interface PipelineConfig {
  ocrLanguages: ReadonlySet<string>;
}

export type AcquisitionOutcome = 'acquired' | 'acquisition_failed';

export class ExtractionPipeline {
  private readonly config: PipelineConfig;

  constructor(
    config: PipelineConfig,
    private readonly acquirer: TextAcquirer,
    private readonly extractor: InvoiceFieldExtractor = invoiceFieldExtractor
  ) {
    this.config = { ocrLanguages: new Set(config.ocrLanguages) };
  }

  get ocrLanguages(): ReadonlySet<string> {
    return this.config.ocrLanguages;
  }

  /**
   * Acquire the text of one document and extract its fields.
   *
   * @throws FatalConfigurationError when the acquirer reports a missing dependency
   */
  async process(
    bytes: Uint8Array,
    label: string,
    preferredClientName?: string
  ): Promise<ExtractedInvoice> {
    return runForDocument(label, () => this.processDocument(bytes, label, preferredClientName));
  }

  private async processDocument(
    bytes: Uint8Array,
    label: string,
    preferredClientName?: string
  ): Promise<ExtractedInvoice> {
    const startTime = Date.now();
    const { text, outcome } = await this.acquireText(bytes, label);

    const invoice = this.extractor.extract(text, label, preferredClientName);

    const duration = (Date.now() - startTime) / 1000;
    documentsProcessedCounter.inc({ acquirer: this.acquirer.name, outcome });
    extractionDurationHistogram.observe({ acquirer: this.acquirer.name }, duration);

    logger.info('Document processed', {
      document_label: label,
      acquirer: this.acquirer.name,
      acquisition: outcome,
      text_length: text.length,
      duration_ms: Math.round(duration * 1000),
    });

    return invoice;
  }

  private async acquireText(
    bytes: Uint8Array,
    label: string
  ): Promise<{ text: string; outcome: AcquisitionOutcome }> {
    try {
      const text = await this.acquirer.acquire(bytes, {
        label,
        languages: this.config.ocrLanguages,
      });
      return { text, outcome: 'acquired' };
    } catch (error) {
      const failure = classifyAcquisitionFailure(error, label);
      if (failure.kind === 'fatal') {
        logger.error('Text acquisition misconfigured', failure.error, {
          document_label: label,
          dependency: failure.error.dependency,
        });
        throw failure.error;
      }

      logger.warn('Text acquisition failed, extracting from empty text', {
        document_label: label,
        acquirer: this.acquirer.name,
        error: failure.error.message,
      });
      return { text: '', outcome: 'acquisition_failed' };
    }
  }
}
