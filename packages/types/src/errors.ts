/**
 * Error taxonomy shared by every conversion stage.
 *
 * Each error carries a machine-readable code plus the structured context
 * (field, row, raw value) a caller needs to render a precise message.
 */

export type ConversionErrorCode =
  | 'FILE_ACCESS'
  | 'HEADER_MISSING'
  | 'MALFORMED_ROW'
  | 'AMOUNT_FORMAT'
  | 'DATE_FORMAT'
  | 'INVALID_PERIOD'
  | 'UNKNOWN_TYPE_VALUE'
  | 'MISSING_REQUIRED_FIELD';

export interface ConversionErrorContext {
  /** Logical field the error concerns (e.g. 'amount', 'currency') */
  field?: string;
  /** Zero-based data row index */
  row?: number;
  /** One-based physical line number in the source file */
  line?: number;
  /** Offending raw value */
  raw?: string;
}

export class ConversionError extends Error {
  public readonly code: ConversionErrorCode;
  public readonly context: ConversionErrorContext;

  constructor(code: ConversionErrorCode, message: string, context: ConversionErrorContext = {}) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
    this.context = context;
  }

  /**
   * Copy of this error with row position attached.
   */
  atRow(row: number, line: number): ConversionError {
    return new ConversionError(this.code, this.message, { ...this.context, row, line });
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}

