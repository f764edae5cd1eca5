/**
 * Transaction assembly: one decoded CSV row plus a column mapping in,
 * one canonical TransactionRecord out.
 */

import { normalizeAmount } from '@csv2ofx/csv-decoder';
import {
  ConversionError,
  isConversionError,
  parseStatementDate,
  type ColumnMapping,
  type DecimalSeparator,
  type DescriptionSeparator,
  type RawRow,
  type TransactionRecord,
  type ZeroAmountType,
} from '@csv2ofx/types';
import { buildDescription } from './description.js';
import { extractOrGenerateId } from './id-generator.js';
import { determineTransactionType } from './transaction-type.js';

export interface AssemblyOptions {
  columns: ColumnMapping;
  decimalSeparator: DecimalSeparator;
  descriptionSeparator: DescriptionSeparator;
  descriptionPlaceholder: string;
  zeroAmountType: ZeroAmountType;
  accountId: string;
}

function requiredField(row: RawRow, column: number | null, field: string): string {
  const value = column === null ? undefined : row.fields[column];
  if (value === undefined) {
    throw new ConversionError('MISSING_REQUIRED_FIELD', `Required field '${field}' is not mapped`, { field });
  }
  return value;
}

/**
 * Numbers repeated keys: the first occurrence gets '', later ones '1', '2', ...
 * Owned by a single conversion pass.
 */
export class OccurrenceCounter {
  private readonly seen = new Map<string, number>();

  next(key: string): string {
    const count = this.seen.get(key) ?? 0;
    this.seen.set(key, count + 1);
    return count === 0 ? '' : String(count);
  }
}

/**
 * Build a record from a row.
 *
 * When a type column is mapped the amount's sign follows the type
 * (DEBIT negative, CREDIT positive). Any failure is rethrown with the row
 * index and line attached.
 *
 * Pass the same OccurrenceCounter for every row of a file so identical
 * transactions still get distinct generated IDs.
 *
 * @throws ConversionError AMOUNT_FORMAT | DATE_FORMAT | UNKNOWN_TYPE_VALUE | MISSING_REQUIRED_FIELD
 */
export function assembleRecord(
  row: RawRow,
  options: AssemblyOptions,
  occurrences: OccurrenceCounter = new OccurrenceCounter()
): TransactionRecord {
  try {
    const { columns } = options;

    const rawDate = requiredField(row, columns.date, 'date');
    const date = parseStatementDate(rawDate);
    if (date === null) {
      throw new ConversionError('DATE_FORMAT', `Unrecognized date format: "${rawDate}"`, {
        field: 'date',
        raw: rawDate,
      });
    }

    let amount = normalizeAmount(requiredField(row, columns.amount, 'amount'), options.decimalSeparator);
    const description = buildDescription(
      row,
      columns.description,
      options.descriptionSeparator,
      options.descriptionPlaceholder
    );
    const type = determineTransactionType(row, columns.type, amount, options.zeroAmountType);

    if (columns.type !== null) {
      const magnitude = Math.abs(amount);
      amount = type === 'DEBIT' ? -magnitude : magnitude;
    }
    if (Object.is(amount, -0)) {
      amount = 0;
    }

    const id = extractOrGenerateId(row, columns.id, {
      date,
      amount,
      description,
      accountId: options.accountId,
      disambiguator: occurrences.next(duplicateKey({ date, amount, description })),
    });

    return { date, amount, description, type, id, sourceRow: row.index, deleted: false };
  } catch (error) {
    if (isConversionError(error)) {
      throw error.atRow(row.index, row.line);
    }
    throw error;
  }
}

/**
 * Key under which identical transactions collide.
 */
export function duplicateKey(record: Pick<TransactionRecord, 'date' | 'amount' | 'description'>): string {
  return `${record.date.getTime()}|${record.amount}|${record.description.trim().toLowerCase()}`;
}
