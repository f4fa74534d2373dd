/**
 * Invoice Extractor
 *
 * Pattern catalog, field matchers and the field extractor for invoices.
 */

export * from './patterns';
export * from './matchers';
export * from './extractor';
