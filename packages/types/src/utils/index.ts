export {
  CONVERTER_VERSION,
  MAX_DESCRIPTION_LENGTH,
  MAX_DESCRIPTION_COLUMNS,
  DEFAULT_DESCRIPTION_PLACEHOLDER,
  DEFAULT_ACCOUNT_ID,
  DEFAULT_BANK_NAME,
  DEFAULT_CURRENCY,
  DEFAULT_LANGUAGE,
  DELIMITER_CHARS,
  DECIMAL_SEPARATOR_CHARS,
  DESCRIPTION_SEPARATOR_STRINGS,
} from './constants.js';
export { SUPPORTED_DATE_FORMATS, parseStatementDate, formatOfxDate, formatOfxDateTime, formatIsoDate, compareCalendarDates } from './date.js';
export {
  parseCanonicalAmount,
  formatAmount,
  negateAmount,
  sumAmounts,
  amountFromNumber,
  type Amount,
} from './money.js';
