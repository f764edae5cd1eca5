import { negateAmount, sumAmounts, type Amount, type BalanceSummary, type TransactionRecord } from '@csv2ofx/types';

/**
 * Aggregate non-deleted records: debits and credits by sign (debits as a
 * magnitude) and final = initial + Σ amount. Deleted records are skipped
 * entirely, so they do not count either.
 */
export function calculateBalanceSummary(
  records: ReadonlyArray<Pick<TransactionRecord, 'amount' | 'deleted'>>,
  initialBalance: Amount
): BalanceSummary {
  const amounts = records.filter((record) => !record.deleted).map((record) => record.amount);
  const totalCredits = sumAmounts(amounts.filter((amount) => amount >= 0));
  const totalDebits = sumAmounts(amounts.filter((amount) => amount < 0).map(negateAmount));

  return {
    initial: initialBalance,
    totalDebits,
    totalCredits,
    final: initialBalance + sumAmounts(amounts),
    count: amounts.length,
  };
}
