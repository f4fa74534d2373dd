/**
 * Extractors Module
 *
 * Field matchers, their registry and the invoice field extractor.
 * The built-in matchers are registered on module load.
 */

export type { FieldMatcher, FieldExtractorOptions, MatcherOutcome } from './types';

export {
  registerMatcher,
  unregisterMatcher,
  getMatcher,
  hasMatcher,
  getAllMatchers,
  clearRegistry,
  registerDefaultMatchers,
  getRegistryStats,
} from './registry';

export {
  // Patterns (exported for testing)
  DATE_PATTERN,
  INVOICE_NUMBER_PATTERN,
  SUPPLIER_LABEL_PATTERN,
  SUPPLIER_FALLBACK_EXCLUSIONS,
  CLIENT_LABEL_PATTERN,
  TAX_PATTERN,
  TOTAL_PATTERN,
  QUALIFIER_WINDOW,
  findFirstDate,
  findInvoiceNumber,
  findTaxAmount,
  findTotals,
  findSupplierFallback,
  findSupplierName,
  findClientName,
  type TotalsMatch,
  // Matchers
  PatternMatcher,
  invoiceDateMatcher,
  invoiceNumberMatcher,
  supplierNameMatcher,
  clientNameMatcher,
  taxAmountMatcher,
  totalExcludingTaxMatcher,
  totalIncludingTaxMatcher,
  DEFAULT_MATCHERS,
  // Extractor
  InvoiceFieldExtractor,
  invoiceFieldExtractor,
  extractInvoiceFields,
} from './invoice';

import { registerDefaultMatchers } from './registry';

// Auto-register the built-in matchers on module load
registerDefaultMatchers();
