import {
  ConversionError,
  TransactionTypeSchema,
  formatAmount,
  type Amount,
  type RawRow,
  type TransactionType,
  type ZeroAmountType,
} from '@csv2ofx/types';

function parseTypeValue(raw: string): TransactionType | null {
  const parsed = TransactionTypeSchema.safeParse(raw.trim().toUpperCase());
  return parsed.success ? parsed.data : null;
}

/**
 * Read the type column when mapped, else infer from the amount's sign.
 *
 * A zero amount has no sign, so its type comes from the explicit
 * `zeroAmountType` policy; 'reject' turns it into a row error.
 *
 * @throws ConversionError UNKNOWN_TYPE_VALUE
 */
export function determineTransactionType(
  row: RawRow,
  typeColumn: number | null,
  amount: Amount,
  zeroAmountType: ZeroAmountType
): TransactionType {
  if (typeColumn !== null) {
    const raw = row.fields[typeColumn] ?? '';
    const parsed = parseTypeValue(raw);
    if (parsed === null) {
      throw new ConversionError('UNKNOWN_TYPE_VALUE', `Unknown transaction type "${raw}" (expected debit or credit)`, {
        field: 'type',
        raw,
      });
    }
    return parsed;
  }

  if (amount < 0) {
    return 'DEBIT';
  }
  if (amount > 0) {
    return 'CREDIT';
  }

  switch (zeroAmountType) {
    case 'credit':
      return 'CREDIT';
    case 'debit':
      return 'DEBIT';
    case 'reject':
      throw new ConversionError('UNKNOWN_TYPE_VALUE', 'Cannot infer a transaction type for a zero amount', {
        field: 'amount',
        raw: formatAmount(amount),
      });
  }
}

export function swapTransactionType(type: TransactionType): TransactionType {
  return type === 'DEBIT' ? 'CREDIT' : 'DEBIT';
}
