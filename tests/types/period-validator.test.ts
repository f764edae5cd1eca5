import { describe, it, expect } from 'vitest';
import { ConversionError, DateStatus, PeriodValidator, createStatementPeriod, formatIsoDate } from '@csv2ofx/types';
import { captureError } from '../helpers/index.js';

describe('PeriodValidator', () => {
  const validator = new PeriodValidator('2025-10-01', '31/10/2025');

  it('should parse boundaries in any supported layout', () => {
    expect(formatIsoDate(validator.start)).toBe('2025-10-01');
    expect(formatIsoDate(validator.end)).toBe('2025-10-31');
  });

  it('should classify dates against the inclusive period', () => {
    expect(validator.status(new Date(2025, 8, 30))).toBe(DateStatus.Before);
    expect(validator.status(new Date(2025, 9, 1))).toBe(DateStatus.Within);
    expect(validator.status(new Date(2025, 9, 31, 23, 59))).toBe(DateStatus.Within);
    expect(validator.status(new Date(2025, 10, 1))).toBe(DateStatus.After);
    expect(validator.contains(new Date(2025, 9, 15))).toBe(true);
    expect(validator.contains(new Date(2025, 10, 15))).toBe(false);
  });

  it('should clamp out-of-range dates to the nearest boundary', () => {
    expect(formatIsoDate(validator.clamp(new Date(2025, 8, 28)))).toBe('2025-10-01');
    expect(formatIsoDate(validator.clamp(new Date(2025, 10, 2)))).toBe('2025-10-31');
    const inside = new Date(2025, 9, 10);
    expect(validator.clamp(inside)).toBe(inside);
  });

  it('should hand out copies of the boundaries', () => {
    validator.start.setFullYear(1999);
    expect(formatIsoDate(validator.start)).toBe('2025-10-01');
  });

  it('should classify dates in a period spanning the new year', () => {
    const yearEnd = new PeriodValidator('2024-12-15', '2025-01-15');

    expect(yearEnd.status(new Date(2024, 11, 14))).toBe(DateStatus.Before);
    expect(yearEnd.status(new Date(2024, 11, 31))).toBe(DateStatus.Within);
    expect(yearEnd.status(new Date(2025, 0, 1))).toBe(DateStatus.Within);
    expect(yearEnd.status(new Date(2025, 0, 16))).toBe(DateStatus.After);
  });

  it('should include February 29 in a leap-year period', () => {
    const february = new PeriodValidator('01/02/2024', '29/02/2024');

    expect(formatIsoDate(february.end)).toBe('2024-02-29');
    expect(february.status(new Date(2024, 1, 29))).toBe(DateStatus.Within);
    expect(february.status(new Date(2024, 2, 1))).toBe(DateStatus.After);
  });

  it('should accept a single-day period', () => {
    const day = new PeriodValidator('2025-10-05', '2025-10-05');
    expect(day.contains(new Date(2025, 9, 5))).toBe(true);
  });

  it('should reject a start after the end', () => {
    const error = captureError(() => new PeriodValidator('2025-11-01', '2025-10-01'));
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ code: 'INVALID_PERIOD', context: { field: 'period' } });
  });

  it('should reject unparseable boundaries', () => {
    const error = captureError(() => new PeriodValidator('2025-10-01', 'end of month'));
    expect(error).toMatchObject({
      code: 'INVALID_PERIOD',
      message: 'Unrecognized end date: end of month',
      context: { field: 'period.end', raw: 'end of month' },
    });
  });

  it('should build from an existing period', () => {
    const period = createStatementPeriod(new Date(2025, 0, 1), new Date(2025, 0, 31));
    const fromPeriod = PeriodValidator.fromPeriod(period);
    expect(formatIsoDate(fromPeriod.end)).toBe('2025-01-31');
  });
});
