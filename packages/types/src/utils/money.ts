/**
 * Exact money arithmetic.
 *
 * An Amount is an integer count of minor units (cents). Parsing and
 * formatting go through strings only, so no binary floating-point value
 * sits between a CSV cell and the TRNAMT written to the statement.
 */

/** Integer number of cents. */
export type Amount = number;

const CANONICAL_AMOUNT = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Parse a canonical decimal string ("-1234.5", "+0.125", ".75") into cents.
 *
 * Digits beyond the second fractional place are rounded half away from zero.
 * Returns null when the string is not a plain signed decimal or the value
 * exceeds the safe integer range.
 */
export function parseCanonicalAmount(value: string): Amount | null {
  const match = value.match(CANONICAL_AMOUNT);
  if (match === null) {
    return null;
  }

  const [, sign = '', whole = '', fraction = ''] = match;
  if (whole === '' && fraction === '') {
    return null;
  }

  const paddedFraction = fraction.padEnd(3, '0');
  let cents = Number(whole === '' ? '0' : whole) * 100 + Number(paddedFraction.substring(0, 2));
  if (Number(paddedFraction.charAt(2)) >= 5) {
    cents += 1;
  }

  if (!Number.isSafeInteger(cents)) {
    return null;
  }

  return sign === '-' && cents !== 0 ? -cents : cents;
}

/**
 * Format cents as a signed decimal with exactly two fractional digits.
 */
export function formatAmount(cents: Amount): string {
  const magnitude = Math.abs(cents);
  const whole = Math.floor(magnitude / 100);
  const fraction = String(magnitude % 100).padStart(2, '0');
  return `${cents < 0 ? '-' : ''}${whole}.${fraction}`;
}

export function negateAmount(cents: Amount): Amount {
  return cents === 0 ? 0 : -cents;
}

export function sumAmounts(amounts: readonly Amount[]): Amount {
  return amounts.reduce((sum, amount) => sum + amount, 0);
}

/**
 * Convert a JavaScript number (e.g. from a JSON config) to cents via its
 * shortest decimal representation, so 0.1 stays 10 cents.
 */
export function amountFromNumber(value: number): Amount | null {
  if (!Number.isFinite(value)) {
    return null;
  }
  return parseCanonicalAmount(String(value));
}
