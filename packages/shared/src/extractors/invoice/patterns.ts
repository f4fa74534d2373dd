/**
 * Invoice Extraction Patterns
 *
 * Regular expressions and pure matching functions for pulling invoice
 * fields out of flat OCR text. Every function takes the whole document
 * text and returns the matched value verbatim, or null.
 *
 * Labels are the French ones found on most of our invoices (Facture,
 * TVA, HT/TTC) with a few English variants.
 */

/**
 * Date token: DD/MM/YYYY, DD-MM-YYYY, DD.MM.YYYY or year-first.
 * No calendar validation, "31/02/2024" is accepted.
 */
export const DATE_PATTERN = /\b(?:\d{2}[/\-.]\d{2}[/\-.]\d{4}|\d{4}[/\-.]\d{2}[/\-.]\d{2})\b/;

/**
 * Invoice number label followed by the identifier token.
 * Either "Facture"/"Invoice" (optionally "n°") then #, : or -,
 * or a standalone "N°"/"No" label.
 */
export const INVOICE_NUMBER_PATTERN =
  /(?:\b(?:Facture|Invoice)\s*(?:n[o°]\.?\s*)?[#:\-][#:\-\s]*|\bN(?:°|o\b)\.?[#:\-\s]*)([A-Za-z0-9\-/_.]+)/i;

/**
 * Supplier label and the rest of its line, or the next line when the
 * label stands alone.
 */
export const SUPPLIER_LABEL_PATTERN =
  /(?:Fournisseur|Soci[eé]t[eé]|Vendeur|[EÉ]metteur)(?![A-Za-zÀ-ÿ])[ \t]*[:\-]?[ \t]*(?:\r?\n[ \t]*)?([^\s:\-][^\r\n]*)/i;

/** A line holding nothing but a supplier label. */
const SUPPLIER_LABEL_LINE = /^(?:Fournisseur|Soci[eé]t[eé]|Vendeur|[EÉ]metteur)[ \t]*[:\-]?$/i;

/**
 * Words that disqualify a line from being the unlabeled supplier name.
 */
export const SUPPLIER_FALLBACK_EXCLUSIONS = /facture|total|tva|client/i;

/**
 * Client label ("Facturé à", "Facturée à", "Client") and the rest of its line.
 */
export const CLIENT_LABEL_PATTERN =
  /(?:Factur(?:é|ée|ee)\s+[àa](?![A-Za-zÀ-ÿ])|(?<![A-Za-zÀ-ÿ])Client(?![A-Za-zÀ-ÿ]))[ \t]*[:\-]?[ \t]*([^\s:\-][^\r\n]*)/i;

/**
 * VAT label followed by a numeric token, optionally a percentage.
 */
export const TAX_PATTERN = /TVA[:\s]*([0-9][0-9.,]{0,19}%?)/i;

/**
 * Amount as printed: digits with . or , separators, spaces only between
 * digit groups, optional euro sign before or after.
 */
const AMOUNT = '(?:€\\s?)?\\d(?:[\\d.,]|[ \\u00a0](?=\\d))*(?:\\s?€)?';

/**
 * Every "Total" label (optionally TTC/HT) followed by an amount.
 * The amount is always the last capture group.
 */
export const TOTAL_PATTERN = new RegExp(`\\bTotal\\s*(?:TTC|HT)?\\s*[:=]?\\s*(${AMOUNT})`, 'gi');

/** How many characters before an amount are inspected for TTC/HT. */
export const QUALIFIER_WINDOW = 15;

// No leading boundary: OCR often glues the qualifier to the label (TotalHT)
const INCLUDING_TAX_QUALIFIER = /TTC\b/i;
const EXCLUDING_TAX_QUALIFIER = /HT\b/i;

export interface TotalsMatch {
  totalExcludingTax: string | null;
  totalIncludingTax: string | null;
}

/**
 * Find the first date-like token in document order.
 */
export function findFirstDate(text: string): string | null {
  const match = text.match(DATE_PATTERN);
  return match ? match[0] : null;
}

/**
 * Find the identifier next to the first invoice-number label.
 */
export function findInvoiceNumber(text: string): string | null {
  const match = text.match(INVOICE_NUMBER_PATTERN);
  return match ? match[1] : null;
}

/**
 * Find the first VAT value.
 */
export function findTaxAmount(text: string): string | null {
  const match = text.match(TAX_PATTERN);
  return match ? match[1] : null;
}

/**
 * Text on the same line just before `index`, at most QUALIFIER_WINDOW chars.
 */
function precedingWindow(text: string, index: number): string {
  const start = Math.max(0, index - QUALIFIER_WINDOW);
  const window = text.slice(start, index);
  const lineBreak = Math.max(window.lastIndexOf('\n'), window.lastIndexOf('\r'));
  return lineBreak === -1 ? window : window.slice(lineBreak + 1);
}

/**
 * Scan every "Total" occurrence and assign its amount to excluding or
 * including tax.
 *
 * Tie-break: TTC in the preceding window wins, then HT. An unqualified
 * total is taken as tax-inclusive, but only while no including-tax value
 * has been recorded. That default is a heuristic (receipts usually put
 * the TTC figure forward), not a checked rule.
 */
export function findTotals(text: string): TotalsMatch {
  let totalExcludingTax: string | null = null;
  let totalIncludingTax: string | null = null;

  for (const match of text.matchAll(TOTAL_PATTERN)) {
    const value = match[1].trim();
    const valueIndex = (match.index ?? 0) + match[0].length - match[1].length;
    const window = precedingWindow(text, valueIndex);

    if (INCLUDING_TAX_QUALIFIER.test(window)) {
      totalIncludingTax = value;
    } else if (EXCLUDING_TAX_QUALIFIER.test(window)) {
      totalExcludingTax = value;
    } else if (!totalIncludingTax) {
      totalIncludingTax = value;
    }
  }

  return { totalExcludingTax, totalIncludingTax };
}

/**
 * First line that could be an unlabeled issuer name.
 */
export function findSupplierFallback(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    const candidate = line.trim();
    if (
      candidate.length > 3 &&
      !SUPPLIER_FALLBACK_EXCLUSIONS.test(candidate) &&
      !SUPPLIER_LABEL_LINE.test(candidate)
    ) {
      return candidate;
    }
  }
  return null;
}

/**
 * Supplier name from an explicit label, else from the first usable line.
 */
export function findSupplierName(text: string): string | null {
  const match = text.match(SUPPLIER_LABEL_PATTERN);
  if (match) {
    return match[1].trim();
  }
  return findSupplierFallback(text);
}

/**
 * Client name from its label. No fallback.
 */
export function findClientName(text: string): string | null {
  const match = text.match(CLIENT_LABEL_PATTERN);
  return match ? match[1].trim() : null;
}
