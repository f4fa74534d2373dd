/**
 * Text Acquisition Contract
 *
 * Turning document bytes into text (PDF text layer, OCR) happens outside
 * the engine. Acquirers signal a missing process-wide dependency with
 * FatalConfigurationError; anything else they throw is a per-document
 * failure.
 */

import { DocumentAcquisitionError, FatalConfigurationError } from '../errors';

export interface AcquisitionOptions {
  /** Document label, for logging */
  label: string;
  /** OCR language codes (tesseract style, e.g. "fra") */
  languages: ReadonlySet<string>;
}

export interface TextAcquirer {
  /** Short name used in logs and metrics */
  readonly name: string;

  /**
   * Produce the raw text of one document.
   *
   * @throws FatalConfigurationError when a required dependency is absent
   * @throws DocumentAcquisitionError (or any other error) when this document cannot be read
   */
  acquire(bytes: Uint8Array, options: AcquisitionOptions): Promise<string>;
}

export type AcquisitionFailure =
  | { kind: 'fatal'; error: FatalConfigurationError }
  | { kind: 'document'; error: DocumentAcquisitionError };

/**
 * Sort an acquisition failure into fatal configuration or per-document.
 * Unknown errors are wrapped as per-document failures.
 */
export function classifyAcquisitionFailure(error: unknown, label: string): AcquisitionFailure {
  if (error instanceof FatalConfigurationError) {
    return { kind: 'fatal', error };
  }
  if (error instanceof DocumentAcquisitionError) {
    return { kind: 'document', error };
  }
  const reason = error instanceof Error ? error.message : String(error);
  return {
    kind: 'document',
    error: new DocumentAcquisitionError(`Text acquisition failed for ${label}: ${reason}`, {
      cause: error,
    }),
  };
}
