/**
 * Conversion configuration validation.
 *
 * Wraps the zod schemas with the validate / validate-or-throw pair used
 * across the project, and resolves header-name mappings to column indices.
 */

import { ConversionError } from '../errors.js';
import {
  ConversionConfigSchema,
  type ColumnMapping,
  type ConversionConfig,
} from '../schemas/config.js';

export interface ConfigValidationError {
  path: string;
  message: string;
}

export type ConfigValidationResult =
  | { valid: true; config: ConversionConfig; errors: [] }
  | { valid: false; config: null; errors: ConfigValidationError[] };

export function validateConversionConfig(input: unknown): ConfigValidationResult {
  const result = ConversionConfigSchema.safeParse(input);
  if (result.success) {
    return { valid: true, config: result.data, errors: [] };
  }

  const errors = result.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '/',
    message: issue.message,
  }));
  return { valid: false, config: null, errors };
}

/**
 * Parse and default a configuration, failing with MISSING_REQUIRED_FIELD
 * naming the first offending field.
 */
export function parseConversionConfig(input: unknown): ConversionConfig {
  const result = validateConversionConfig(input);
  if (result.valid) {
    return result.config;
  }

  const [first] = result.errors;
  const details = result.errors
    .slice(0, 10)
    .map((e) => `  ${e.path}: ${e.message}`)
    .join('\n');
  throw new ConversionError('MISSING_REQUIRED_FIELD', `Invalid conversion config:\n${details}`, {
    field: first?.path,
  });
}

/**
 * Column mapping expressed with header names instead of indices.
 * Omitted or empty names mean "not mapped".
 */
export interface ColumnNameMapping {
  date?: string | null;
  amount?: string | null;
  description?: ReadonlyArray<string | null>;
  type?: string | null;
  id?: string | null;
}

function resolveHeader(headers: readonly string[], name: string | null | undefined, field: string): number | null {
  if (name === undefined || name === null || name.trim() === '') {
    return null;
  }
  const index = headers.indexOf(name);
  if (index === -1) {
    throw new ConversionError('MISSING_REQUIRED_FIELD', `Column "${name}" mapped to ${field} is not in the CSV header`, {
      field,
      raw: name,
    });
  }
  return index;
}

export function resolveColumnMapping(headers: readonly string[], byName: ColumnNameMapping): ColumnMapping {
  return {
    date: resolveHeader(headers, byName.date, 'date'),
    amount: resolveHeader(headers, byName.amount, 'amount'),
    description: (byName.description ?? []).map((name, i) => resolveHeader(headers, name, `description[${i}]`)),
    type: resolveHeader(headers, byName.type, 'type'),
    id: resolveHeader(headers, byName.id, 'id'),
  };
}

function checkIndex(index: number | null, headerCount: number, field: string): void {
  if (index !== null && index >= headerCount) {
    throw new ConversionError(
      'MISSING_REQUIRED_FIELD',
      `Column ${index} mapped to ${field} is out of range (CSV has ${headerCount} columns)`,
      { field, raw: String(index) }
    );
  }
}

/**
 * Check a mapping against the decoded header: date and amount must be
 * mapped, at least one description column selected, every index in range.
 */
export function validateColumnMapping(mapping: ColumnMapping, headerCount: number): void {
  if (mapping.date === null) {
    throw new ConversionError('MISSING_REQUIRED_FIELD', "Required field 'date' is not mapped", { field: 'date' });
  }
  if (mapping.amount === null) {
    throw new ConversionError('MISSING_REQUIRED_FIELD', "Required field 'amount' is not mapped", { field: 'amount' });
  }
  if (!mapping.description.some((index) => index !== null)) {
    throw new ConversionError('MISSING_REQUIRED_FIELD', 'No description column is selected', {
      field: 'description',
    });
  }

  checkIndex(mapping.date, headerCount, 'date');
  checkIndex(mapping.amount, headerCount, 'amount');
  mapping.description.forEach((index, i) => checkIndex(index, headerCount, `description[${i}]`));
  checkIndex(mapping.type, headerCount, 'type');
  checkIndex(mapping.id, headerCount, 'id');
}
