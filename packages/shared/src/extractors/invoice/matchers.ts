/**
 * Invoice Field Matchers
 *
 * FieldMatcher implementations over the pattern catalog, one per field.
 */

import type { InvoiceField } from '../../types';
import type { FieldMatcher } from '../types';
import {
  findFirstDate,
  findInvoiceNumber,
  findSupplierName,
  findClientName,
  findTaxAmount,
  findTotals,
  type TotalsMatch,
} from './patterns';

/**
 * Matcher backed by a plain pattern function.
 */
export class PatternMatcher implements FieldMatcher {
  constructor(
    readonly name: InvoiceField,
    readonly description: string,
    private readonly find: (text: string) => string | null
  ) {}

  tryMatch(text: string): string | null {
    const value = this.find(text);
    return value ? value : null;
  }
}

export const invoiceDateMatcher = new PatternMatcher(
  'invoiceDate',
  'First DD/MM/YYYY or YYYY-MM-DD style token',
  findFirstDate
);

export const invoiceNumberMatcher = new PatternMatcher(
  'invoiceNumber',
  'Identifier following a Facture/Invoice or N° label',
  findInvoiceNumber
);

export const supplierNameMatcher = new PatternMatcher(
  'supplierName',
  'Fournisseur/Société/Vendeur/Émetteur label, else first substantive line',
  findSupplierName
);

export const clientNameMatcher = new PatternMatcher(
  'clientName',
  'Rest of the line after Facturé à/Client',
  findClientName
);

export const taxAmountMatcher = new PatternMatcher(
  'taxAmount',
  'Numeric value following the first TVA label',
  findTaxAmount
);

let lastTotals: { text: string; totals: TotalsMatch } | null = null;

/**
 * Both totals matchers read the same scan; the last result is reused
 * while the text is unchanged.
 */
function totalsFor(text: string): TotalsMatch {
  if (!lastTotals || lastTotals.text !== text) {
    lastTotals = { text, totals: findTotals(text) };
  }
  return lastTotals.totals;
}

export const totalExcludingTaxMatcher = new PatternMatcher(
  'totalExcludingTax',
  'Total qualified HT',
  (text) => totalsFor(text).totalExcludingTax
);

export const totalIncludingTaxMatcher = new PatternMatcher(
  'totalIncludingTax',
  'Total qualified TTC, or the first unqualified total',
  (text) => totalsFor(text).totalIncludingTax
);

/**
 * The built-in catalog, in registration order.
 */
export const DEFAULT_MATCHERS: readonly FieldMatcher[] = [
  invoiceDateMatcher,
  invoiceNumberMatcher,
  supplierNameMatcher,
  clientNameMatcher,
  totalExcludingTaxMatcher,
  totalIncludingTaxMatcher,
  taxAmountMatcher,
];
