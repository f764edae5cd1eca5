import { z } from 'zod';
import type { Amount } from '../utils/money.js';

export const TransactionTypeSchema = z.enum(['DEBIT', 'CREDIT']);
export type TransactionType = z.infer<typeof TransactionTypeSchema>;

/**
 * One decoded CSV data line. `fields` follows header order; `values`
 * is the same data keyed by header name for previews.
 */
export interface RawRow {
  /** Zero-based data row index (the header is not counted) */
  readonly index: number;
  /** One-based physical line where the record starts */
  readonly line: number;
  readonly fields: readonly string[];
  readonly values: Readonly<Record<string, string>>;
}

export interface DecodedTable {
  readonly headers: readonly string[];
  readonly rows: readonly RawRow[];
}

export interface TransactionRecord {
  readonly date: Date;
  readonly amount: Amount;
  readonly description: string;
  readonly type: TransactionType;
  readonly id: string;
  /** Zero-based index of the source data row */
  readonly sourceRow: number;
  /** Set by a reviewer before rendering; deleted records are left out of totals and output. */
  deleted: boolean;
}

export interface BalanceSummary {
  readonly initial: Amount;
  /** Magnitude of all negative amounts */
  readonly totalDebits: Amount;
  readonly totalCredits: Amount;
  readonly final: Amount;
  readonly count: number;
}
