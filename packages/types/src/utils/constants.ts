export const CONVERTER_VERSION = '0.1.0';

/** Longest MEMO (and description) the OFX 1.0.2 DTD accepts. */
export const MAX_DESCRIPTION_LENGTH = 255;

export const DEFAULT_DESCRIPTION_PLACEHOLDER = 'Transaction';
export const DEFAULT_ACCOUNT_ID = 'UNKNOWN';
export const DEFAULT_BANK_NAME = 'CSV Import';
export const DEFAULT_CURRENCY = 'BRL';
export const DEFAULT_LANGUAGE = 'POR';

/** Up to four source columns can be combined into one description. */
export const MAX_DESCRIPTION_COLUMNS = 4;

export const DELIMITER_CHARS = {
  comma: ',',
  semicolon: ';',
  tab: '\t',
  pipe: '|',
} as const;

export const DECIMAL_SEPARATOR_CHARS = {
  dot: '.',
  comma: ',',
} as const;

export const DESCRIPTION_SEPARATOR_STRINGS = {
  space: ' ',
  dash: ' - ',
  comma: ', ',
  pipe: ' | ',
} as const;
