/**
 * Field Matcher Types
 *
 * Each invoice field is produced by an independent matcher so matchers
 * can be added, removed or reordered without touching the extractor.
 */

import type { ExtractedInvoice, InvoiceField } from '../types';

/**
 * A named heuristic that extracts one field from raw document text.
 * Implementations must be pure: no state shared across calls.
 */
export interface FieldMatcher {
  /** The record field this matcher fills */
  readonly name: InvoiceField;

  /** Human-readable description of the heuristic */
  readonly description: string;

  /**
   * Try to find the field in the document text.
   *
   * @returns The value verbatim, or null when nothing matched
   */
  tryMatch(text: string): string | null;
}

/**
 * Options for building an extractor
 */
export interface FieldExtractorOptions {
  /** Matchers to run, defaults to the registered catalog */
  matchers?: readonly FieldMatcher[];
  /** Clock for capturedAt, defaults to the system clock */
  now?: () => Date;
}

/**
 * Outcome of running one matcher, kept for logging and metrics
 */
export interface MatcherOutcome {
  field: InvoiceField;
  status: 'matched' | 'no_match' | 'failed';
}

export type { ExtractedInvoice, InvoiceField };
