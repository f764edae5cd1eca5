import { describe, it, expect } from 'vitest';
import { normalizeAmount } from '@csv2ofx/csv-decoder';
import { ConversionError, type DecimalSeparator } from '@csv2ofx/types';
import { captureError } from '../helpers/index.js';

type Layout = 'leading-sign' | 'inner-sign' | 'suffix' | 'parentheses' | 'trailing-minus';

const LAYOUTS: Layout[] = ['leading-sign', 'inner-sign', 'suffix', 'parentheses', 'trailing-minus'];

/**
 * Write cents the way a bank export would: grouped thousands, the chosen
 * decimal separator and a currency symbol.
 */
const renderAmount = (cents: number, decimalSeparator: DecimalSeparator, layout: Layout): string => {
  const decimal = decimalSeparator === 'comma' ? ',' : '.';
  const thousands = decimalSeparator === 'comma' ? '.' : ',';
  const magnitude = Math.abs(cents);
  const whole = String(Math.floor(magnitude / 100)).replace(/\B(?=(\d{3})+(?!\d))/g, thousands);
  const body = `${whole}${decimal}${String(magnitude % 100).padStart(2, '0')}`;
  const negative = cents < 0;

  switch (layout) {
    case 'leading-sign':
      return `${negative ? '-' : ''}R$ ${body}`;
    case 'inner-sign':
      return `R$ ${negative ? '-' : ''}${body}`;
    case 'suffix':
      return `${negative ? '-' : ''}${body} R$`;
    case 'parentheses':
      return negative ? `(R$ ${body})` : `R$ ${body}`;
    case 'trailing-minus':
      return `${body}${negative ? '-' : ''}`;
  }
};

describe('normalizeAmount', () => {
  it('should normalize a comma-decimal amount', () => {
    expect(normalizeAmount('-100,50', 'comma')).toBe(-10050);
  });

  it('should normalize dot-decimal amounts with thousands separators', () => {
    expect(normalizeAmount('100.50', 'dot')).toBe(10050);
    expect(normalizeAmount('1,234.56', 'dot')).toBe(123456);
    expect(normalizeAmount('1.234.567,89', 'comma')).toBe(123456789);
  });

  it('should read the same digits differently per decimal separator', () => {
    expect(normalizeAmount('1.000', 'comma')).toBe(100000);
    expect(normalizeAmount('1.000', 'dot')).toBe(100);
    expect(normalizeAmount('1,000', 'comma')).toBe(100);
  });

  it('should accept currency symbols before or after the sign', () => {
    expect(normalizeAmount('-R$ 1.234,56', 'comma')).toBe(-123456);
    expect(normalizeAmount('R$ -100,00', 'comma')).toBe(-10000);
    expect(normalizeAmount('$ 1,000.00 USD', 'dot')).toBe(100000);
    expect(normalizeAmount('+€12', 'dot')).toBe(1200);
  });

  it('should negate parentheses and trailing minus', () => {
    expect(normalizeAmount('(100,50)', 'comma')).toBe(-10050);
    expect(normalizeAmount('(R$ 50,00)', 'comma')).toBe(-5000);
    expect(normalizeAmount('100,50-', 'comma')).toBe(-10050);
  });

  it('should ignore whitespace anywhere', () => {
    expect(normalizeAmount(' 1 000,5 ', 'comma')).toBe(100050);
  });

  it('should round beyond two decimals half away from zero', () => {
    expect(normalizeAmount('0,125', 'comma')).toBe(13);
    expect(normalizeAmount('-0.125', 'dot')).toBe(-13);
  });

  it('should not produce negative zero', () => {
    expect(Object.is(normalizeAmount('- 0,00', 'comma'), 0)).toBe(true);
  });

  it('should reject malformed amounts with the raw value', () => {
    const error = captureError(() => normalizeAmount('abc', 'dot'));
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({
      code: 'AMOUNT_FORMAT',
      message: 'Invalid amount format: "abc" (not a number)',
      context: { field: 'amount', raw: 'abc' },
    });
  });

  it('should accept symbols with a letter prefix and three-letter codes', () => {
    expect(normalizeAmount('US$ 12.50', 'dot')).toBe(1250);
    expect(normalizeAmount('12,50 BRL', 'comma')).toBe(1250);
    expect(normalizeAmount('EUR -3.10', 'dot')).toBe(-310);
  });

  it('should reject text around the number that is not a currency', () => {
    for (const raw of ['approx 12.50', '12.50 pending', 'Total: 5', 'abc12', 'usd 5']) {
      expect(captureError(() => normalizeAmount(raw, 'dot'))).toMatchObject({
        code: 'AMOUNT_FORMAT',
        message: `Invalid amount format: "${raw}" (not a number)`,
      });
    }
  });

  it('should name the reason for each rejection', () => {
    const reason = (raw: string, decimalSeparator: DecimalSeparator): string => {
      const error = captureError(() => normalizeAmount(raw, decimalSeparator));
      return error instanceof Error ? error.message : '';
    };

    expect(reason('', 'dot')).toBe('Invalid amount format: "" (empty value)');
    expect(reason('--5', 'dot')).toBe('Invalid amount format: "--5" (conflicting signs)');
    expect(reason('-(5)', 'dot')).toBe('Invalid amount format: "-(5)" (conflicting signs)');
    expect(reason('(5', 'dot')).toBe('Invalid amount format: "(5" (unbalanced parentheses)');
    expect(reason('1.2.3', 'dot')).toBe('Invalid amount format: "1.2.3" (more than one decimal separator)');
    expect(reason('12,5,6', 'comma')).toBe('Invalid amount format: "12,5,6" (more than one decimal separator)');
    expect(reason('.', 'dot')).toBe('Invalid amount format: "." (not a number)');
  });

  it('should normalize rendered amounts back to the same cents', () => {
    const values = [0, 1, -1, 99, -100, 10050, -10050, 123456, -123456, 100000000, -987654321];

    for (const decimalSeparator of ['dot', 'comma'] as const) {
      for (const layout of LAYOUTS) {
        for (const cents of values) {
          expect(normalizeAmount(renderAmount(cents, decimalSeparator, layout), decimalSeparator)).toBe(cents);
        }
      }
    }
  });
});
