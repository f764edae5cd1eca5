/**
 * CSV → OFX conversion pipeline.
 *
 * Decodes the CSV, assembles one record per row, applies the statement
 * period policy, and hands the surviving records to a serializer wrapped
 * in a ConversionSession for review and rendering. Runs as one synchronous
 * pass over in-memory data.
 */

import { assembleRecord, OccurrenceCounter, type AssemblyOptions } from '@csv2ofx/assembler';
import { decodeCsv } from '@csv2ofx/csv-decoder';
import { StatementSerializer } from '@csv2ofx/output';
import {
  ConversionError,
  PeriodValidator,
  isConversionError,
  parseConversionConfig,
  validateColumnMapping,
  type ConversionConfig,
  type ConversionErrorCode,
  type DecodedTable,
  type TransactionRecord,
} from '@csv2ofx/types';
import { applyDatePolicy } from './date-policy.js';
import { ConversionSession } from './session.js';

export interface ConversionStats {
  /** Data rows in the CSV */
  total: number;
  /** Records handed to the serializer */
  included: number;
  /** Included records whose date was moved to a period boundary */
  adjusted: number;
  /** Rows dropped by the statement period policy */
  excluded: number;
  /** Included records left outside the period */
  kept: number;
  /** Rows that could not be assembled */
  failed: number;
}

export interface RowError {
  row: number;
  line: number;
  code: ConversionErrorCode;
  message: string;
  field?: string;
  raw?: string;
}

export interface ConvertOptions {
  onRowError?: (error: RowError) => void;
  onDateAdjusted?: (row: number, from: Date, to: Date) => void;
}

export type ConversionResult =
  | {
      success: true;
      message: string;
      stats: ConversionStats;
      headers: readonly string[];
      records: readonly TransactionRecord[];
      errors: RowError[];
      session: ConversionSession;
    }
  | {
      success: false;
      message: string;
      stats: ConversionStats;
      headers: readonly string[];
      records: readonly TransactionRecord[];
      errors: RowError[];
      session: null;
    };

function emptyStats(total = 0): ConversionStats {
  return { total, included: 0, adjusted: 0, excluded: 0, kept: 0, failed: 0 };
}

function toRowError(error: ConversionError, fallbackRow: number, fallbackLine: number): RowError {
  return {
    row: error.context.row ?? fallbackRow,
    line: error.context.line ?? fallbackLine,
    code: error.code,
    message: error.message,
    field: error.context.field,
    raw: error.context.raw,
  };
}

/**
 * Multi-line summary of a successful conversion.
 */
export function formatSuccessMessage(stats: ConversionStats, hasPeriod: boolean): string {
  const lines = [
    'Conversion completed successfully!',
    '',
    `Total rows in CSV: ${stats.total}`,
    `Transactions included: ${stats.included}`,
    `Transactions excluded: ${stats.excluded}`,
  ];
  if (stats.failed > 0) {
    lines.push(`Rows skipped due to errors: ${stats.failed}`);
  }
  if (hasPeriod && stats.adjusted > 0) {
    lines.push(`Dates adjusted to boundaries: ${stats.adjusted}`);
  }
  if (hasPeriod && stats.kept > 0) {
    lines.push(`Out-of-range dates kept: ${stats.kept}`);
  }
  return lines.join('\n');
}

function assemblyOptions(config: ConversionConfig): AssemblyOptions {
  return {
    columns: config.columns,
    decimalSeparator: config.decimalSeparator,
    descriptionSeparator: config.descriptionSeparator,
    descriptionPlaceholder: config.descriptionPlaceholder,
    zeroAmountType: config.zeroAmountType,
    accountId: config.accountId,
  };
}

function failure(
  message: string,
  stats: ConversionStats,
  headers: readonly string[],
  errors: RowError[]
): ConversionResult {
  return { success: false, message, stats, headers, records: [], errors, session: null };
}

interface PreparedConversion {
  config: ConversionConfig;
  table: DecodedTable;
  validator: PeriodValidator | null;
}

function prepare(input: Uint8Array | string, configInput: unknown): PreparedConversion {
  const config = parseConversionConfig(configInput);
  const table = decodeCsv(input, config.delimiter);
  validateColumnMapping(config.columns, table.headers.length);
  const validator = config.period === undefined ? null : new PeriodValidator(config.period.start, config.period.end);
  return { config, table, validator };
}

/**
 * Convert CSV content using a conversion config (validated and defaulted
 * here). Never throws for bad input: fatal problems come back as
 * `success: false` with the reason in `message`.
 */
export function convertCsv(input: Uint8Array | string, configInput: unknown, options: ConvertOptions = {}): ConversionResult {
  let prepared: PreparedConversion;
  try {
    prepared = prepare(input, configInput);
  } catch (error) {
    if (isConversionError(error)) {
      return failure(`Conversion failed: ${error.message}`, emptyStats(), [], []);
    }
    throw error;
  }
  const { config, table, validator } = prepared;

  const stats = emptyStats(table.rows.length);
  const errors: RowError[] = [];
  const serializer = new StatementSerializer(config.invertValues);
  const occurrences = new OccurrenceCounter();
  const assembly = assemblyOptions(config);

  for (const row of table.rows) {
    let record: TransactionRecord;
    try {
      record = assembleRecord(row, assembly, occurrences);
    } catch (error) {
      if (!isConversionError(error)) {
        throw error;
      }
      const rowError = toRowError(error, row.index, row.line);
      errors.push(rowError);
      options.onRowError?.(rowError);
      stats.failed++;
      if (config.rowErrorPolicy === 'abort') {
        return failure(`Conversion failed at line ${rowError.line}: ${rowError.message}`, stats, table.headers, errors);
      }
      continue;
    }

    if (validator !== null && config.period !== undefined) {
      const outcome = applyDatePolicy(record.date, row.index, validator, config.period);
      switch (outcome.kind) {
        case 'excluded':
          stats.excluded++;
          continue;
        case 'adjusted':
          stats.adjusted++;
          options.onDateAdjusted?.(row.index, outcome.from, outcome.date);
          record = { ...record, date: outcome.date };
          break;
        case 'kept':
          stats.kept++;
          break;
        case 'within':
          break;
      }
    }

    serializer.add(record);
    stats.included++;
  }

  if (stats.included === 0) {
    return failure('Conversion failed: No transactions to export', stats, table.headers, errors);
  }

  const session = new ConversionSession(serializer, config, validator?.period ?? null);
  return {
    success: true,
    message: formatSuccessMessage(stats, validator !== null),
    stats,
    headers: table.headers,
    records: session.records,
    errors,
    session,
  };
}
