/**
 * Shared TypeScript Types
 *
 * The extracted invoice record and its export layout, matching
 * docs/contracts/extracted_invoice.schema.json.
 */

// ============================================================================
// Extracted Invoice
// ============================================================================

/**
 * One record per input document. Every field is a plain string; a field
 * that could not be found is the empty string, never missing or null.
 */
export interface ExtractedInvoice {
  /** UTC ISO-8601 timestamp of the extraction */
  readonly capturedAt: string;
  readonly clientName: string;
  readonly supplierName: string;
  /** First date-like token, verbatim (not parsed) */
  readonly invoiceDate: string;
  readonly invoiceNumber: string;
  readonly totalExcludingTax: string;
  readonly totalIncludingTax: string;
  /** VAT value as printed, may carry a percent sign */
  readonly taxAmount: string;
}

/** Fields produced by pattern matching (everything but the timestamp). */
export type InvoiceField = Exclude<keyof ExtractedInvoice, 'capturedAt'>;

export const INVOICE_FIELDS = [
  'clientName',
  'supplierName',
  'invoiceDate',
  'invoiceNumber',
  'totalExcludingTax',
  'totalIncludingTax',
  'taxAmount',
] as const satisfies readonly InvoiceField[];

// ============================================================================
// Export Layout
// ============================================================================

/**
 * Column order of the tabular export. Field names and column names are
 * kept together here so they cannot drift apart.
 */
export const EXPORT_COLUMNS = [
  { column: 'Timestamp', field: 'capturedAt' },
  { column: 'Nom', field: 'clientName' },
  { column: 'NomFournisseur', field: 'supplierName' },
  { column: 'DateFacture', field: 'invoiceDate' },
  { column: 'NumFacture', field: 'invoiceNumber' },
  { column: 'TotalHT', field: 'totalExcludingTax' },
  { column: 'TotalTTC', field: 'totalIncludingTax' },
  { column: 'TVA', field: 'taxAmount' },
] as const satisfies ReadonlyArray<{ column: string; field: keyof ExtractedInvoice }>;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number]['column'];

export type InvoiceExportRow = Record<ExportColumn, string>;

/**
 * Serialize a record field-for-field into an export row.
 */
export function toExportRow(invoice: ExtractedInvoice): InvoiceExportRow {
  return {
    Timestamp: invoice.capturedAt,
    Nom: invoice.clientName,
    NomFournisseur: invoice.supplierName,
    DateFacture: invoice.invoiceDate,
    NumFacture: invoice.invoiceNumber,
    TotalHT: invoice.totalExcludingTax,
    TotalTTC: invoice.totalIncludingTax,
    TVA: invoice.taxAmount,
  };
}

/**
 * Build an immutable record. Missing fields default to the empty string.
 */
export function createExtractedInvoice(
  capturedAt: string,
  fields: Partial<Record<InvoiceField, string>> = {}
): ExtractedInvoice {
  return Object.freeze({
    capturedAt,
    clientName: fields.clientName ?? '',
    supplierName: fields.supplierName ?? '',
    invoiceDate: fields.invoiceDate ?? '',
    invoiceNumber: fields.invoiceNumber ?? '',
    totalExcludingTax: fields.totalExcludingTax ?? '',
    totalIncludingTax: fields.totalIncludingTax ?? '',
    taxAmount: fields.taxAmount ?? '',
  });
}

/**
 * Copy a record with a trusted client name (e.g. the form respondent).
 * Blank names leave the record untouched.
 */
export function withClientName(invoice: ExtractedInvoice, clientName: string | undefined): ExtractedInvoice {
  const trusted = clientName?.trim();
  if (!trusted) {
    return invoice;
  }
  return Object.freeze({ ...invoice, clientName: trusted });
}

// ============================================================================
// Batch
// ============================================================================

export type BatchStatus = 'ok' | 'no_data_extracted';

export interface InvoiceBatchResult {
  status: BatchStatus;
  records: ExtractedInvoice[];
  rows: InvoiceExportRow[];
}
