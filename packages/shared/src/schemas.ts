/**
 * JSON Schema Validation
 *
 * Validates extracted invoice records and export rows with Ajv against
 * docs/contracts/extracted_invoice.schema.json.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

const SCHEMA_FILE = 'extracted_invoice.schema.json';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

let invoiceValidator: ValidateFunction | null = null;
let exportRowValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): Record<string, unknown> {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory (containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  const schemaPath = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`Schema file not found: ${schemaName}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Schema file is not a JSON object: ${schemaName}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function compileValidators(): { invoice: ValidateFunction; exportRow: ValidateFunction } {
  if (!invoiceValidator || !exportRowValidator) {
    const schema = loadSchema(SCHEMA_FILE);
    ajv.addSchema(schema);
    const id = String(schema.$id);
    invoiceValidator = ajv.compile({ $ref: `${id}#/$defs/ExtractedInvoice` });
    exportRowValidator = ajv.compile({ $ref: `${id}#/$defs/InvoiceExportRow` });
  }
  return { invoice: invoiceValidator, exportRow: exportRowValidator };
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidator(validate: ValidateFunction, data: unknown, kind: string): ValidationResult {
  if (validate(data)) {
    return { valid: true };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${kind} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate an ExtractedInvoice: all eight fields present and strings,
 * capturedAt a date-time.
 */
export function validateInvoice(data: unknown): ValidationResult {
  return runValidator(compileValidators().invoice, data, 'ExtractedInvoice');
}

/**
 * Validate an export row against the column layout.
 */
export function validateExportRow(data: unknown): ValidationResult {
  return runValidator(compileValidators().exportRow, data, 'InvoiceExportRow');
}
