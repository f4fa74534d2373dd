/**
 * Matcher Registry
 *
 * Registry pattern for field matchers. One matcher per field; the
 * default extractor runs whatever is registered here.
 */

import type { InvoiceField } from '../types';
import type { FieldMatcher } from './types';
import { DEFAULT_MATCHERS } from './invoice/matchers';
import { logger } from '../logger';

const matcherRegistry = new Map<InvoiceField, FieldMatcher>();

/**
 * Register a matcher for its field.
 * Overwrites any existing matcher for that field.
 */
export function registerMatcher(matcher: FieldMatcher): void {
  matcherRegistry.set(matcher.name, matcher);

  logger.debug('Registered matcher', {
    field: matcher.name,
    description: matcher.description,
  });
}

/**
 * Remove the matcher for a field.
 *
 * @returns True if a matcher was registered
 */
export function unregisterMatcher(field: InvoiceField): boolean {
  return matcherRegistry.delete(field);
}

export function getMatcher(field: InvoiceField): FieldMatcher | undefined {
  return matcherRegistry.get(field);
}

export function hasMatcher(field: InvoiceField): boolean {
  return matcherRegistry.has(field);
}

/**
 * Get all registered matchers in registration order.
 */
export function getAllMatchers(): FieldMatcher[] {
  return Array.from(matcherRegistry.values());
}

/**
 * Clear all registered matchers.
 * Useful for testing.
 */
export function clearRegistry(): void {
  matcherRegistry.clear();
}

/**
 * Register the built-in catalog.
 */
export function registerDefaultMatchers(): void {
  for (const matcher of DEFAULT_MATCHERS) {
    registerMatcher(matcher);
  }
}

export function getRegistryStats(): {
  totalMatchers: number;
  fields: InvoiceField[];
} {
  return {
    totalMatchers: matcherRegistry.size,
    fields: Array.from(matcherRegistry.keys()),
  };
}
