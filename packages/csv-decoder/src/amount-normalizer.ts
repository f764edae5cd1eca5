import {
  ConversionError,
  DECIMAL_SEPARATOR_CHARS,
  parseCanonicalAmount,
  type Amount,
  type DecimalSeparator,
} from '@csv2ofx/types';

/**
 * Locale amount layout once whitespace is gone:
 * optional "(", sign, currency affix, sign, "(", digits with separators,
 * ")", currency affix, trailing "-", ")".
 * A currency affix is a currency symbol with up to three letters before it
 * ("R$", "US$", "€") or a three-letter code ("USD").
 */
const AMOUNT_PATTERN =
  /^(\()?([+-])?((?:[A-Za-z]{0,3}\p{Sc}|[A-Z]{3})?)([+-])?(\()?([\d.,]+)(\))?((?:[A-Za-z]{0,3}\p{Sc}|[A-Z]{3})?)(-)?(\))?$/u;

function amountError(raw: string, reason: string): ConversionError {
  return new ConversionError('AMOUNT_FORMAT', `Invalid amount format: "${raw}" (${reason})`, {
    field: 'amount',
    raw,
  });
}

/**
 * Swap a locale number body to canonical dot form: drop the thousands
 * separator, then turn the configured decimal separator into ".".
 */
function canonicalBody(body: string, decimalSeparator: DecimalSeparator): string | null {
  const decimal = DECIMAL_SEPARATOR_CHARS[decimalSeparator];
  const thousands = DECIMAL_SEPARATOR_CHARS[decimalSeparator === 'comma' ? 'dot' : 'comma'];

  const withoutThousands = body.split(thousands).join('');
  const parts = withoutThousands.split(decimal);
  if (parts.length > 2) {
    return null;
  }
  return parts.join('.');
}

/**
 * Normalize a locale-formatted amount string into exact cents.
 *
 * Currency symbols may sit before or after the sign ("-R$ 100,00",
 * "R$ -100,00"), parentheses negate ("(100,50)"), and a trailing minus
 * ("100,50-") also negates. Fractions beyond two digits are rounded half
 * away from zero.
 *
 * @throws ConversionError AMOUNT_FORMAT when the stripped text is not a signed decimal
 */
export function normalizeAmount(raw: string, decimalSeparator: DecimalSeparator): Amount {
  const compact = raw.replace(/\s+/gu, '');
  if (compact === '') {
    throw amountError(raw, 'empty value');
  }

  const match = compact.match(AMOUNT_PATTERN);
  if (match === null) {
    throw amountError(raw, 'not a number');
  }

  const [, openOuter, leadSign, , innerSign, openInner, body = '', closeInner, , trailingMinus, closeOuter] = match;

  const opens = (openOuter !== undefined ? 1 : 0) + (openInner !== undefined ? 1 : 0);
  const closes = (closeInner !== undefined ? 1 : 0) + (closeOuter !== undefined ? 1 : 0);
  if (opens !== closes || opens > 1) {
    throw amountError(raw, 'unbalanced parentheses');
  }

  const signs = [leadSign, innerSign, trailingMinus].filter((sign) => sign !== undefined);
  if (signs.length > 1 || (opens === 1 && signs.length > 0)) {
    throw amountError(raw, 'conflicting signs');
  }

  const canonical = canonicalBody(body, decimalSeparator);
  if (canonical === null) {
    throw amountError(raw, 'more than one decimal separator');
  }

  const magnitude = parseCanonicalAmount(canonical);
  if (magnitude === null) {
    throw amountError(raw, 'not a number');
  }

  const negative = opens === 1 || signs[0] === '-';
  return negative && magnitude !== 0 ? -magnitude : magnitude;
}
