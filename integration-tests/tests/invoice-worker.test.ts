/**
 * Invoice Worker Tests
 *
 * Tests document routing, tesseract error mapping and the extract_invoice
 * job processor with in-memory stand-ins for files and queues.
 */

import { UnrecoverableError } from 'bullmq';
import {
  ExtractionPipeline,
  InvoiceFieldExtractor,
  FatalConfigurationError,
  DocumentAcquisitionError,
  type AcquisitionOptions,
  type ExportInvoiceRowJob,
  type TextAcquirer,
} from '@invoicescan/shared';
import {
  DocumentTextAcquirer,
  detectDocumentKind,
} from '../../services/worker-invoice-extractor/src/lib/acquirer';
import { PdfTextAcquirer } from '../../services/worker-invoice-extractor/src/lib/pdf';
import {
  TesseractTextAcquirer,
  tesseractArgs,
} from '../../services/worker-invoice-extractor/src/lib/tesseract';
import {
  createExtractInvoiceProcessor,
  resolveDocumentPath,
  type ExtractInvoiceJobLike,
  type RowPublisher,
} from '../../services/worker-invoice-extractor/src/lib/processor';

const PDF_BYTES = Buffer.from('%PDF-1.7\n%fake');
const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

const OPTIONS: AcquisitionOptions = { label: 'doc', languages: new Set(['fra']) };
const FIXED_NOW = new Date('2024-04-05T10:00:00.000Z');

/**
 * One-page PDF with one Helvetica text line per entry, top to bottom.
 */
function buildPdf(lines: string[]): Buffer {
  const content = lines
    .map((line, i) => `BT /F1 12 Tf 72 ${720 - i * 20} Td (${line}) Tj ET`)
    .join('\n');
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(pdf, 'latin1');
}

class FixedTextAcquirer implements TextAcquirer {
  constructor(
    readonly name: string,
    private readonly text: string
  ) {}

  async acquire(): Promise<string> {
    return this.text;
  }
}

class MemoryRowPublisher implements RowPublisher {
  readonly added: Array<{ name: string; data: ExportInvoiceRowJob; opts?: { jobId?: string } }> = [];

  async add(name: string, data: ExportInvoiceRowJob, opts?: { jobId?: string }): Promise<void> {
    this.added.push({ name, data, opts });
  }
}

function job(overrides: Partial<ExtractInvoiceJobLike['data']> = {}): ExtractInvoiceJobLike {
  return {
    id: '7',
    attemptsMade: 0,
    data: {
      event_type: 'invoice.available',
      correlation_id: 'corr-1',
      batch_id: 'batch-1',
      document_label: 'file_0',
      raw_uri: 'file:///object-store/batch-1/file_0.pdf',
      ...overrides,
    },
  };
}

describe('Invoice Worker', () => {
  describe('detectDocumentKind', () => {
    it('should recognize PDF and image signatures', () => {
      expect(detectDocumentKind(PDF_BYTES)).toBe('pdf');
      expect(detectDocumentKind(PNG_BYTES)).toBe('image');
      expect(detectDocumentKind(JPEG_BYTES)).toBe('image');
    });

    it('should report anything else as unknown', () => {
      expect(detectDocumentKind(Buffer.from('hello'))).toBe('unknown');
      expect(detectDocumentKind(new Uint8Array(0))).toBe('unknown');
    });
  });

  describe('DocumentTextAcquirer', () => {
    const acquirer = new DocumentTextAcquirer(
      new FixedTextAcquirer('pdf', 'from pdf'),
      new FixedTextAcquirer('image', 'from image')
    );

    it('should route PDFs and images', async () => {
      await expect(acquirer.acquire(PDF_BYTES, OPTIONS)).resolves.toBe('from pdf');
      await expect(acquirer.acquire(JPEG_BYTES, OPTIONS)).resolves.toBe('from image');
    });

    it('should reject empty documents', async () => {
      await expect(acquirer.acquire(new Uint8Array(0), OPTIONS)).rejects.toBeInstanceOf(
        DocumentAcquisitionError
      );
    });

    it('should reject unsupported formats', async () => {
      await expect(
        acquirer.acquire(Buffer.from('plain text'), { ...OPTIONS, label: 'notes.txt' })
      ).rejects.toThrow('Unsupported document format: notes.txt');
    });
  });

  describe('PdfTextAcquirer', () => {
    const acquirer = new PdfTextAcquirer();

    it('should return the text layer line by line, top to bottom', async () => {
      const bytes = buildPdf(['ACME SARL', 'Total HT: 100,00']);

      expect(detectDocumentKind(bytes)).toBe('pdf');
      await expect(acquirer.acquire(bytes, OPTIONS)).resolves.toBe('ACME SARL\nTotal HT: 100,00');
    });

    it('should return empty text for a page without a text layer', async () => {
      await expect(acquirer.acquire(buildPdf([]), OPTIONS)).resolves.toBe('');
    });

    it('should reject an unreadable PDF as a document error', async () => {
      await expect(
        acquirer.acquire(Buffer.from('%PDF-garbage'), OPTIONS)
      ).rejects.toBeInstanceOf(DocumentAcquisitionError);
    });
  });

  describe('TesseractTextAcquirer', () => {
    it('should build the language argument', () => {
      expect(tesseractArgs(new Set(['fra', 'eng']))).toEqual(['stdin', 'stdout', '-l', 'fra+eng']);
      expect(tesseractArgs(new Set<string>())).toEqual(['stdin', 'stdout']);
    });

    it('should report a missing binary as fatal configuration', async () => {
      const acquirer = new TesseractTextAcquirer({
        binaryPath: '/nonexistent/bin/tesseract',
        timeoutMs: 5000,
      });

      const failure = acquirer.acquire(PNG_BYTES, OPTIONS);

      await expect(failure).rejects.toBeInstanceOf(FatalConfigurationError);
      await expect(failure).rejects.toMatchObject({ dependency: 'tesseract' });
    });

    it('should let the fatal error cross the pipeline', async () => {
      const pipeline = new ExtractionPipeline(
        { ocrLanguages: new Set(['fra']) },
        new DocumentTextAcquirer(
          new FixedTextAcquirer('pdf', ''),
          new TesseractTextAcquirer({ binaryPath: '/nonexistent/bin/tesseract', timeoutMs: 5000 })
        )
      );

      await expect(pipeline.process(PNG_BYTES, 'scan.png')).rejects.toBeInstanceOf(
        FatalConfigurationError
      );
    });
  });

  describe('resolveDocumentPath', () => {
    it('should resolve file URIs, absolute and relative paths', () => {
      expect(resolveDocumentPath('file:///data/a.pdf', '/store')).toBe('/data/a.pdf');
      expect(resolveDocumentPath('/data/a.pdf', '/store')).toBe('/data/a.pdf');
      expect(resolveDocumentPath('batch-1/a.pdf', '/store')).toBe('/store/batch-1/a.pdf');
    });
  });

  describe('extract_invoice processor', () => {
    const extractor = new InvoiceFieldExtractor({ now: () => FIXED_NOW });

    it('should publish the export row of the extracted invoice', async () => {
      const rows = new MemoryRowPublisher();
      const reads: string[] = [];
      const pipeline = new ExtractionPipeline(
        { ocrLanguages: new Set(['fra']) },
        new DocumentTextAcquirer(
          new FixedTextAcquirer('pdf', 'Garage Leroy\nFacture N° GL-88\nTotal: 42,00 €'),
          new FixedTextAcquirer('image', '')
        ),
        extractor
      );
      const processJob = createExtractInvoiceProcessor({
        pipeline,
        rows,
        readDocument: async (filePath) => {
          reads.push(filePath);
          return PDF_BYTES;
        },
      });

      await processJob(job());

      expect(reads).toEqual(['/object-store/batch-1/file_0.pdf']);
      expect(rows.added).toHaveLength(1);
      expect(rows.added[0].name).toBe('export_invoice_row');
      expect(rows.added[0].opts).toEqual({ jobId: 'row_batch-1_7' });
      expect(rows.added[0].data).toEqual({
        event_type: 'invoice.extracted',
        correlation_id: 'corr-1',
        batch_id: 'batch-1',
        document_label: 'file_0',
        row: {
          Timestamp: '2024-04-05T10:00:00.000Z',
          Nom: '',
          NomFournisseur: 'Garage Leroy',
          DateFacture: '',
          NumFacture: 'GL-88',
          TotalHT: '',
          TotalTTC: '42,00 €',
          TVA: '',
        },
      });
    });

    it('should publish an empty row when the file cannot be read', async () => {
      const rows = new MemoryRowPublisher();
      const pipeline = new ExtractionPipeline(
        { ocrLanguages: new Set(['fra']) },
        new DocumentTextAcquirer(new FixedTextAcquirer('pdf', 'never'), new FixedTextAcquirer('image', 'never')),
        extractor
      );
      const processJob = createExtractInvoiceProcessor({
        pipeline,
        rows,
        readDocument: async () => {
          throw new Error('ENOENT: no such file or directory');
        },
      });

      await processJob(job({ preferred_client_name: 'Claire Martin' }));

      expect(rows.added[0].data.row).toEqual({
        Timestamp: '2024-04-05T10:00:00.000Z',
        Nom: 'Claire Martin',
        NomFournisseur: '',
        DateFacture: '',
        NumFacture: '',
        TotalHT: '',
        TotalTTC: '',
        TVA: '',
      });
    });

    it('should fail the job without retries on fatal configuration', async () => {
      const rows = new MemoryRowPublisher();
      const fatalAcquirer: TextAcquirer = {
        name: 'broken',
        acquire: async () => {
          throw new FatalConfigurationError('tesseract binary not found', 'tesseract');
        },
      };
      const processJob = createExtractInvoiceProcessor({
        pipeline: new ExtractionPipeline({ ocrLanguages: new Set(['fra']) }, fatalAcquirer, extractor),
        rows,
        readDocument: async () => PNG_BYTES,
      });

      const failure = processJob(job());

      await expect(failure).rejects.toBeInstanceOf(UnrecoverableError);
      await expect(failure).rejects.toThrow('FatalConfigurationError: tesseract binary not found');
      expect(rows.added).toHaveLength(0);
    });
  });
});
