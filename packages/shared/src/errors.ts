/**
 * Error Taxonomy
 *
 * Only FatalConfigurationError is allowed to cross the extraction
 * boundary. Per-document acquisition failures are absorbed by the
 * pipeline, and a pattern that does not match is plain empty data.
 */

export type InvoiceScanErrorCode = 'FATAL_CONFIGURATION' | 'DOCUMENT_ACQUISITION';

export abstract class InvoiceScanError extends Error {
  abstract readonly code: InvoiceScanErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A dependency required for text acquisition is missing process-wide
 * (OCR binary, its language data, the PDF worker module). Not retried.
 */
export class FatalConfigurationError extends InvoiceScanError {
  readonly code = 'FATAL_CONFIGURATION' as const;

  constructor(
    message: string,
    readonly dependency: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Reading or decoding one specific document failed.
 */
export class DocumentAcquisitionError extends InvoiceScanError {
  readonly code = 'DOCUMENT_ACQUISITION' as const;
}

export function isFatalConfigurationError(error: unknown): error is FatalConfigurationError {
  return error instanceof FatalConfigurationError;
}
