/**
 * Document Text Acquirer
 *
 * Routes each document to PDF text extraction or OCR based on its file
 * signature.
 */

import {
  DocumentAcquisitionError,
  type AcquisitionOptions,
  type TextAcquirer,
} from '@invoicescan/shared';

export type DocumentKind = 'pdf' | 'image' | 'unknown';

const SIGNATURES: Array<{ kind: Exclude<DocumentKind, 'unknown'>; bytes: number[] }> = [
  { kind: 'pdf', bytes: [0x25, 0x50, 0x44, 0x46] }, // %PDF
  { kind: 'image', bytes: [0x89, 0x50, 0x4e, 0x47] }, // PNG
  { kind: 'image', bytes: [0xff, 0xd8, 0xff] }, // JPEG
  { kind: 'image', bytes: [0x49, 0x49, 0x2a, 0x00] }, // TIFF little-endian
  { kind: 'image', bytes: [0x4d, 0x4d, 0x00, 0x2a] }, // TIFF big-endian
];

export function detectDocumentKind(bytes: Uint8Array): DocumentKind {
  const match = SIGNATURES.find((signature) =>
    signature.bytes.every((byte, index) => bytes[index] === byte)
  );
  return match ? match.kind : 'unknown';
}

export class DocumentTextAcquirer implements TextAcquirer {
  readonly name = 'document';

  constructor(
    private readonly pdf: TextAcquirer,
    private readonly image: TextAcquirer
  ) {}

  async acquire(bytes: Uint8Array, options: AcquisitionOptions): Promise<string> {
    if (bytes.length === 0) {
      throw new DocumentAcquisitionError(`Empty document: ${options.label}`);
    }

    switch (detectDocumentKind(bytes)) {
      case 'pdf':
        return this.pdf.acquire(bytes, options);
      case 'image':
        return this.image.acquire(bytes, options);
      default:
        throw new DocumentAcquisitionError(`Unsupported document format: ${options.label}`);
    }
  }
}
