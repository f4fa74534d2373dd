/**
 * Invoice Field Extractor
 *
 * Runs every field matcher against one document's text and assembles a
 * single ExtractedInvoice. Matchers are isolated from each other: a
 * matcher that throws leaves its own field empty and nothing else.
 */

import type { ExtractedInvoice, InvoiceField } from '../../types';
import { createExtractedInvoice, withClientName } from '../../types';
import type { FieldMatcher, FieldExtractorOptions, MatcherOutcome } from '../types';
import { getAllMatchers } from '../registry';
import { logger, describeError } from '../../logger';
import { matcherOutcomesCounter } from '../../metrics';

export class InvoiceFieldExtractor {
  private readonly matchers: readonly FieldMatcher[] | undefined;
  private readonly now: () => Date;

  constructor(options: FieldExtractorOptions = {}) {
    this.matchers = options.matchers;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Extract all invoice fields from `text`.
   *
   * @param label - Document label, used for logging only
   * @param preferredClientName - Trusted name that replaces the matched client name
   */
  extract(text: string, label: string, preferredClientName?: string): ExtractedInvoice {
    const fields: Partial<Record<InvoiceField, string>> = {};
    const outcomes: MatcherOutcome[] = [];

    for (const matcher of this.matchers ?? getAllMatchers()) {
      const outcome = this.runMatcher(matcher, text, label);
      if (outcome.value) {
        fields[matcher.name] = outcome.value;
      }
      outcomes.push({ field: matcher.name, status: outcome.status });
      matcherOutcomesCounter.inc({ field: matcher.name, status: outcome.status });
    }

    const invoice = withClientName(
      createExtractedInvoice(this.now().toISOString(), fields),
      preferredClientName
    );

    logger.debug('Invoice fields extracted', {
      document_label: label,
      text_length: text.length,
      matched: outcomes.filter((o) => o.status === 'matched').map((o) => o.field),
      failed: outcomes.filter((o) => o.status === 'failed').map((o) => o.field),
      client_name_overridden: invoice.clientName !== (fields.clientName ?? ''),
    });

    return invoice;
  }

  private runMatcher(
    matcher: FieldMatcher,
    text: string,
    label: string
  ): { status: MatcherOutcome['status']; value: string | null } {
    try {
      const value = matcher.tryMatch(text);
      return value ? { status: 'matched', value } : { status: 'no_match', value: null };
    } catch (error) {
      logger.warn('Matcher failed, leaving field empty', {
        document_label: label,
        field: matcher.name,
        error: describeError(error),
      });
      return { status: 'failed', value: null };
    }
  }
}

export const invoiceFieldExtractor = new InvoiceFieldExtractor();

/**
 * Extract one invoice record from document text using the registered
 * matchers. Never throws for any string input.
 */
export function extractInvoiceFields(
  text: string,
  label: string,
  preferredClientName?: string
): ExtractedInvoice {
  return invoiceFieldExtractor.extract(text, label, preferredClientName);
}
