import { z } from 'zod';
import {
  DEFAULT_ACCOUNT_ID,
  DEFAULT_BANK_NAME,
  DEFAULT_CURRENCY,
  DEFAULT_DESCRIPTION_PLACEHOLDER,
  DEFAULT_LANGUAGE,
  MAX_DESCRIPTION_COLUMNS,
} from '../utils/constants.js';
import { amountFromNumber, parseCanonicalAmount } from '../utils/money.js';

export const DelimiterSchema = z.enum(['comma', 'semicolon', 'tab', 'pipe']);
export type Delimiter = z.infer<typeof DelimiterSchema>;

export const DecimalSeparatorSchema = z.enum(['dot', 'comma']);
export type DecimalSeparator = z.infer<typeof DecimalSeparatorSchema>;

export const DescriptionSeparatorSchema = z.enum(['space', 'dash', 'comma', 'pipe']);
export type DescriptionSeparator = z.infer<typeof DescriptionSeparatorSchema>;

/** What to do with a transaction dated outside the statement period. */
export const DateActionSchema = z.enum(['keep', 'adjust', 'exclude']);
export type DateAction = z.infer<typeof DateActionSchema>;

/** Type given to a zero-amount row when no type column is mapped. */
export const ZeroAmountTypeSchema = z.enum(['credit', 'debit', 'reject']);
export type ZeroAmountType = z.infer<typeof ZeroAmountTypeSchema>;

export const RowErrorPolicySchema = z.enum(['skip', 'abort']);
export type RowErrorPolicy = z.infer<typeof RowErrorPolicySchema>;

const ColumnIndexSchema = z.number().int().nonnegative().nullable();

/**
 * Index-based column mapping. `null` means "not mapped".
 */
export const ColumnMappingSchema = z.object({
  date: ColumnIndexSchema,
  amount: ColumnIndexSchema,
  /** One to four columns joined into the description, in order */
  description: z.array(ColumnIndexSchema).max(MAX_DESCRIPTION_COLUMNS),
  type: ColumnIndexSchema.default(null),
  id: ColumnIndexSchema.default(null),
});
export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;
export type ColumnMappingInput = z.input<typeof ColumnMappingSchema>;

/**
 * Decimal amount given as a canonical string ("1234.56") or a number,
 * converted to cents.
 */
export const AmountInputSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const cents = typeof value === 'number' ? amountFromNumber(value) : parseCanonicalAmount(value.trim());
  if (cents === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount: ${String(value)}` });
    return z.NEVER;
  }
  return cents;
});

export const PeriodConfigSchema = z.object({
  start: z.string().min(1, 'Period start is required'),
  end: z.string().min(1, 'Period end is required'),
  /** Applied to every out-of-range row without a per-row decision */
  outOfRange: DateActionSchema.optional(),
  /** Per-row decisions keyed by zero-based data row index */
  decisions: z.record(z.string().regex(/^\d+$/, 'Row index must be a non-negative integer'), DateActionSchema).default({}),
});
export type PeriodConfig = z.infer<typeof PeriodConfigSchema>;

export const ConversionConfigSchema = z.object({
  delimiter: DelimiterSchema.default('comma'),
  decimalSeparator: DecimalSeparatorSchema.default('dot'),
  columns: ColumnMappingSchema,
  descriptionSeparator: DescriptionSeparatorSchema.default('space'),
  descriptionPlaceholder: z.string().default(DEFAULT_DESCRIPTION_PLACEHOLDER),
  accountId: z.string().default(DEFAULT_ACCOUNT_ID),
  bankName: z.string().default(DEFAULT_BANK_NAME),
  currency: z.string().default(DEFAULT_CURRENCY),
  language: z.string().default(DEFAULT_LANGUAGE),
  initialBalance: AmountInputSchema.default(0),
  finalBalance: AmountInputSchema.optional(),
  invertValues: z.boolean().default(false),
  zeroAmountType: ZeroAmountTypeSchema.default('credit'),
  rowErrorPolicy: RowErrorPolicySchema.default('skip'),
  period: PeriodConfigSchema.optional(),
});
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type ConversionConfigInput = z.input<typeof ConversionConfigSchema>;
