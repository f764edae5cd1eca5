/**
 * OFX Statement Serializer
 *
 * Accumulates finalized transaction records and renders them as an
 * OFX 1.0.2 (SGML) credit-card statement.
 *
 * The record buffer is owned by a single writer: one caller adds records
 * sequentially, then renders. It is not meant to be shared across workers.
 */

import { calculateBalanceSummary, swapTransactionType } from '@csv2ofx/assembler';
import {
  ConversionError,
  DEFAULT_LANGUAGE,
  compareCalendarDates,
  formatAmount,
  formatOfxDate,
  formatOfxDateTime,
  negateAmount,
  type Amount,
  type BalanceSummary,
  type StatementPeriod,
  type TransactionRecord,
} from '@csv2ofx/types';
import { OFX_HEADER_LINES, element, escapeSgml, formatMemo } from './sgml.js';

/**
 * Statement-level inputs for one render.
 */
export interface GenerateOptions {
  accountId: string;
  bankName: string;
  /** ISO 4217 code, e.g. 'BRL' */
  currency: string;
  period: StatementPeriod | null | undefined;
  initialBalance: Amount;
  /** Overrides the computed ledger balance */
  finalBalance?: Amount;
  /** SONRS LANGUAGE (default: 'POR') */
  language?: string;
  /** DTSERVER timestamp (default: midnight of the period end) */
  generatedAt?: Date;
}

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

function missingField(field: string, message: string): ConversionError {
  return new ConversionError('MISSING_REQUIRED_FIELD', message, { field });
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function checkPeriod(period: StatementPeriod | null | undefined): StatementPeriod {
  if (period === null || period === undefined) {
    throw missingField('period', 'Statement period is required');
  }
  if (!isValidDate(period.start) || !isValidDate(period.end) || compareCalendarDates(period.start, period.end) > 0) {
    throw missingField('period', 'Statement period is invalid');
  }
  return period;
}

/**
 * Generate the sign-on block
 */
function signOnLines(bankName: string, language: string, generatedAt: Date): string[] {
  return [
    '<SIGNONMSGSRSV1>',
    '<SONRS>',
    '<STATUS>',
    element('CODE', '0'),
    element('SEVERITY', 'INFO'),
    '</STATUS>',
    element('DTSERVER', formatOfxDateTime(generatedAt)),
    element('LANGUAGE', escapeSgml(language)),
    '<FI>',
    element('ORG', escapeSgml(bankName)),
    element('FID', '0'),
    '</FI>',
    '</SONRS>',
    '</SIGNONMSGSRSV1>',
  ];
}

/**
 * Generate OFX for a single transaction
 */
function transactionLines(record: TransactionRecord): string[] {
  return [
    '<STMTTRN>',
    element('TRNTYPE', record.type),
    element('DTPOSTED', formatOfxDate(record.date)),
    element('TRNAMT', formatAmount(record.amount)),
    element('FITID', escapeSgml(record.id)),
    element('MEMO', formatMemo(record.description)),
    '</STMTTRN>',
  ];
}

function balanceLines(tag: 'LEDGERBAL' | 'AVAILBAL', amount: Amount, asOf: Date): string[] {
  return [`<${tag}>`, element('BALAMT', formatAmount(amount)), element('DTASOF', formatOfxDate(asOf)), `</${tag}>`];
}

export class StatementSerializer {
  readonly invertValues: boolean;
  private readonly entries: TransactionRecord[] = [];

  /**
   * @param invertValues - negate every added amount and swap DEBIT/CREDIT
   */
  constructor(invertValues = false) {
    this.invertValues = invertValues;
  }

  /**
   * Append a record and return its position in the buffer. The stored
   * record is a copy, inverted when the serializer was built to invert.
   */
  add(record: TransactionRecord): number {
    const stored: TransactionRecord = this.invertValues
      ? { ...record, amount: negateAmount(record.amount), type: swapTransactionType(record.type) }
      : { ...record };
    this.entries.push(stored);
    return this.entries.length - 1;
  }

  /**
   * Stored records in insertion order. Their `deleted` flag may be toggled
   * before rendering.
   */
  get records(): readonly TransactionRecord[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  setDeleted(index: number, deleted: boolean): void {
    const record = this.entries[index];
    if (record === undefined) {
      throw new RangeError(`No record at index ${index} (buffer holds ${this.entries.length})`);
    }
    record.deleted = deleted;
  }

  summary(initialBalance: Amount): BalanceSummary {
    return calculateBalanceSummary(this.entries, initialBalance);
  }

  /**
   * Non-deleted records by date; equal dates keep insertion order.
   */
  sortedRecords(): TransactionRecord[] {
    return this.entries
      .filter((record) => !record.deleted)
      .sort((a, b) => compareCalendarDates(a.date, b.date));
  }

  /**
   * Render the OFX document. Rendering does not change the buffer, so
   * repeated calls with the same state return the same text.
   *
   * @throws ConversionError MISSING_REQUIRED_FIELD for a blank account id,
   *         a currency that is not a 3-letter code, or a missing/invalid period
   */
  generate(options: GenerateOptions): string {
    const accountId = options.accountId.trim();
    if (accountId === '') {
      throw missingField('accountId', 'Account ID is required');
    }
    const currency = options.currency.trim().toUpperCase();
    if (!CURRENCY_PATTERN.test(currency)) {
      throw missingField('currency', `Currency must be a 3-letter ISO code, got "${options.currency}"`);
    }
    const period = checkPeriod(options.period);

    const finalBalance = options.finalBalance ?? this.summary(options.initialBalance).final;
    const generatedAt = options.generatedAt ?? period.end;

    const lines: string[] = [
      ...OFX_HEADER_LINES,
      '',
      '<OFX>',
      ...signOnLines(options.bankName, options.language ?? DEFAULT_LANGUAGE, generatedAt),
      '<CREDITCARDMSGSRSV1>',
      '<CCSTMTTRNRS>',
      element('TRNUID', '1001'),
      '<STATUS>',
      element('CODE', '0'),
      element('SEVERITY', 'INFO'),
      '</STATUS>',
      '<CCSTMTRS>',
      element('CURDEF', currency),
      '<CCACCTFROM>',
      element('ACCTID', escapeSgml(accountId)),
      '</CCACCTFROM>',
      '<BANKTRANLIST>',
      element('DTSTART', formatOfxDate(period.start)),
      element('DTEND', formatOfxDate(period.end)),
      ...this.sortedRecords().flatMap(transactionLines),
      '</BANKTRANLIST>',
      ...balanceLines('LEDGERBAL', finalBalance, period.end),
      ...balanceLines('AVAILBAL', options.initialBalance, period.start),
      '</CCSTMTRS>',
      '</CCSTMTTRNRS>',
      '</CREDITCARDMSGSRSV1>',
      '</OFX>',
    ];

    return lines.join('\n');
  }
}
