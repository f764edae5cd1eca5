export {
  DelimiterSchema,
  DecimalSeparatorSchema,
  DescriptionSeparatorSchema,
  DateActionSchema,
  ZeroAmountTypeSchema,
  RowErrorPolicySchema,
  ColumnMappingSchema,
  AmountInputSchema,
  PeriodConfigSchema,
  ConversionConfigSchema,
} from './config.js';

export type {
  Delimiter,
  DecimalSeparator,
  DescriptionSeparator,
  DateAction,
  ZeroAmountType,
  RowErrorPolicy,
  ColumnMapping,
  ColumnMappingInput,
  PeriodConfig,
  ConversionConfig,
  ConversionConfigInput,
} from './config.js';

export { TransactionTypeSchema } from './records.js';
export type { TransactionType, RawRow, DecodedTable, TransactionRecord, BalanceSummary } from './records.js';
