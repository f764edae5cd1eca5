#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command, Option } from 'commander';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { convertCsv, type ConversionResult } from '@csv2ofx/converter';
import { decodeCsv, normalizeAmount } from '@csv2ofx/csv-decoder';
import {
  CONVERTER_VERSION,
  ConversionError,
  DateActionSchema,
  DecimalSeparatorSchema,
  DelimiterSchema,
  DescriptionSeparatorSchema,
  RowErrorPolicySchema,
  ZeroAmountTypeSchema,
  formatAmount,
  formatIsoDate,
  resolveColumnMapping,
  type ColumnMapping,
  type ConversionConfigInput,
  type DecimalSeparator,
} from '@csv2ofx/types';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface ConvertCliOptions {
  delimiter: string;
  decimal: string;
  date: string;
  amount: string;
  description: string;
  descriptionSeparator: string;
  placeholder?: string;
  type?: string;
  id?: string;
  accountId?: string;
  bankName?: string;
  currency?: string;
  initialBalance?: string;
  finalBalance?: string;
  invert: boolean;
  zeroAmountType: string;
  onRowError: string;
  periodStart?: string;
  periodEnd?: string;
  outOfRange?: string;
  out?: string;
  verbose: boolean;
}

async function readInput(csvFile: string): Promise<Uint8Array> {
  const filePath = resolve(csvFile);
  try {
    return await readFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConversionError('FILE_ACCESS', `Cannot read ${filePath}: ${reason}`, { raw: filePath });
  }
}

/** A column given as a zero-based index. */
function columnIndex(value: string | undefined): number | null {
  return value !== undefined && /^\d+$/.test(value.trim()) ? Number(value.trim()) : null;
}

/** A column given as a header name. */
function columnName(value: string | undefined): string | undefined {
  return value === undefined || columnIndex(value) !== null ? undefined : value.trim();
}

/**
 * Column mapping from CLI values, each either a zero-based index or a
 * header name.
 */
function buildColumnMapping(headers: readonly string[], options: ConvertCliOptions): ColumnMapping {
  const descriptionColumns = options.description.split(',');
  const byName = resolveColumnMapping(headers, {
    date: columnName(options.date),
    amount: columnName(options.amount),
    description: descriptionColumns.map((value) => columnName(value) ?? null),
    type: columnName(options.type),
    id: columnName(options.id),
  });

  return {
    date: columnIndex(options.date) ?? byName.date,
    amount: columnIndex(options.amount) ?? byName.amount,
    description: descriptionColumns.map((value, i) => columnIndex(value) ?? byName.description[i] ?? null),
    type: columnIndex(options.type) ?? byName.type,
    id: columnIndex(options.id) ?? byName.id,
  };
}

function balanceInput(value: string | undefined, decimal: DecimalSeparator): string | undefined {
  return value === undefined ? undefined : formatAmount(normalizeAmount(value, decimal));
}

function buildConfig(headers: readonly string[], options: ConvertCliOptions): ConversionConfigInput {
  const decimal = DecimalSeparatorSchema.parse(options.decimal);
  const config: ConversionConfigInput = {
    delimiter: DelimiterSchema.parse(options.delimiter),
    decimalSeparator: decimal,
    columns: buildColumnMapping(headers, options),
    descriptionSeparator: DescriptionSeparatorSchema.parse(options.descriptionSeparator),
    descriptionPlaceholder: options.placeholder,
    accountId: options.accountId,
    bankName: options.bankName,
    currency: options.currency,
    initialBalance: balanceInput(options.initialBalance, decimal),
    finalBalance: balanceInput(options.finalBalance, decimal),
    invertValues: options.invert,
    zeroAmountType: ZeroAmountTypeSchema.parse(options.zeroAmountType),
    rowErrorPolicy: RowErrorPolicySchema.parse(options.onRowError),
  };

  if (options.periodStart !== undefined || options.periodEnd !== undefined) {
    if (options.periodStart === undefined || options.periodEnd === undefined) {
      throw new ConversionError('INVALID_PERIOD', '--period-start and --period-end must be given together', {
        field: 'period',
      });
    }
    config.period = {
      start: options.periodStart,
      end: options.periodEnd,
      outOfRange: options.outOfRange === undefined ? undefined : DateActionSchema.parse(options.outOfRange),
    };
  }

  return config;
}

function reportFailure(result: ConversionResult, verbose: boolean): never {
  console.error(`[ERROR] ${result.message}`);
  if (verbose) {
    console.error(`[INFO] Rows read: ${result.stats.total}, failed: ${result.stats.failed}`);
  }
  process.exit(1);
}

async function runConvert(csvFile: string, options: ConvertCliOptions): Promise<void> {
  const content = await readInput(csvFile);
  const { headers } = decodeCsv(content, DelimiterSchema.parse(options.delimiter));

  if (options.verbose) {
    console.error(`[INFO] Converting: ${resolve(csvFile)}`);
    console.error(`[INFO] Converter version: ${CONVERTER_VERSION}`);
    console.error(`[INFO] Columns: ${headers.join(', ')}`);
  }

  const result = convertCsv(content, buildConfig(headers, options), {
    onRowError: (rowError) => {
      console.error(`[WARN] Line ${rowError.line}: ${rowError.message}`);
    },
    onDateAdjusted: (row, from, to) => {
      if (options.verbose) {
        console.error(`[INFO] Row ${row}: date ${formatIsoDate(from)} adjusted to ${formatIsoDate(to)}`);
      }
    },
  });

  if (!result.success) {
    reportFailure(result, options.verbose);
  }

  const ofx = result.session.render();

  if (options.verbose) {
    const summary = result.session.summary();
    console.error(`[INFO] Credits: ${formatAmount(summary.totalCredits)}, debits: ${formatAmount(summary.totalDebits)}`);
    console.error(`[INFO] Balance: ${formatAmount(summary.initial)} -> ${formatAmount(summary.final)}`);
  }

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, ofx, 'utf-8');
    console.error(`[INFO] OFX written to: ${outPath}`);
  } else {
    process.stdout.write(`${ofx}\n`);
  }

  for (const line of result.message.split('\n')) {
    if (line !== '') {
      console.error(`[INFO] ${line}`);
    }
  }
}

async function runHeaders(csvFile: string, options: { delimiter: string }): Promise<void> {
  const content = await readInput(csvFile);
  const { headers, rows } = decodeCsv(content, DelimiterSchema.parse(options.delimiter));
  headers.forEach((header, index) => {
    console.log(`${index}\t${header}`);
  });
  console.error(`[INFO] ${rows.length} data row(s)`);
}

function handleError(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

const delimiterOption = (): Option =>
  new Option('--delimiter <delimiter>', 'CSV field delimiter')
    .choices(DelimiterSchema.options)
    .default(process.env['CSV2OFX_DELIMITER'] ?? 'comma');

program
  .name('csv2ofx')
  .description('Convert bank CSV exports into OFX 1.0.2 credit card statements')
  .version(CONVERTER_VERSION);

program
  .command('convert')
  .description('Convert a CSV file to OFX')
  .argument('<csv-file>', 'Path to the CSV file')
  .addOption(delimiterOption())
  .addOption(
    new Option('--decimal <separator>', 'Decimal separator of the amount column')
      .choices(DecimalSeparatorSchema.options)
      .default(process.env['CSV2OFX_DECIMAL'] ?? 'dot')
  )
  .requiredOption('--date <column>', 'Date column (index or header name)')
  .requiredOption('--amount <column>', 'Amount column (index or header name)')
  .requiredOption('--description <columns>', 'Comma-separated description columns, up to four')
  .addOption(
    new Option('--description-separator <separator>', 'Separator between description columns')
      .choices(DescriptionSeparatorSchema.options)
      .default('space')
  )
  .option('--placeholder <text>', 'Description used when every description column is empty')
  .option('--type <column>', 'DEBIT/CREDIT column (index or header name)')
  .option('--id <column>', 'Transaction ID column (index or header name)')
  .option('--account-id <id>', 'Account identifier', process.env['CSV2OFX_ACCOUNT_ID'])
  .option('--bank-name <name>', 'Bank name for the signon block', process.env['CSV2OFX_BANK_NAME'])
  .option('--currency <code>', 'ISO 4217 currency code', process.env['CSV2OFX_CURRENCY'])
  .option('--initial-balance <amount>', 'Opening balance', process.env['CSV2OFX_INITIAL_BALANCE'])
  .option('--final-balance <amount>', 'Closing balance; computed from the transactions when omitted')
  .option('--invert', 'Invert the sign of every amount', envBool('CSV2OFX_INVERT', false))
  .addOption(
    new Option('--zero-amount-type <type>', 'Type given to zero-amount rows')
      .choices(ZeroAmountTypeSchema.options)
      .default('credit')
  )
  .addOption(
    new Option('--on-row-error <policy>', 'Skip bad rows or abort the conversion')
      .choices(RowErrorPolicySchema.options)
      .default('skip')
  )
  .option('--period-start <date>', 'Statement period start')
  .option('--period-end <date>', 'Statement period end')
  .addOption(
    new Option('--out-of-range <action>', 'Action for dates outside the period').choices(DateActionSchema.options)
  )
  .option('-o, --out <file>', 'Output file path (default: stdout)')
  .option('-v, --verbose', 'Enable verbose output', envBool('CSV2OFX_VERBOSE', false))
  .action(async (csvFile: string, options: ConvertCliOptions) => {
    try {
      await runConvert(csvFile, options);
    } catch (error) {
      handleError(error, options.verbose);
    }
  });

program
  .command('headers')
  .description('List the CSV header columns with their indices')
  .argument('<csv-file>', 'Path to the CSV file')
  .addOption(delimiterOption())
  .action(async (csvFile: string, options: { delimiter: string }) => {
    try {
      await runHeaders(csvFile, options);
    } catch (error) {
      handleError(error, envBool('CSV2OFX_VERBOSE', false));
    }
  });

await program.parseAsync();
