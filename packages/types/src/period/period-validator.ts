/**
 * Statement period validation.
 *
 * A StatementPeriod is an inclusive calendar-date range. PeriodValidator
 * classifies candidate dates against it and clamps out-of-range dates to
 * the nearest boundary.
 */

import { ConversionError } from '../errors.js';
import { compareCalendarDates, formatIsoDate, parseStatementDate } from '../utils/date.js';

export const DateStatus = {
  Before: 'before',
  Within: 'within',
  After: 'after',
} as const;
export type DateStatus = (typeof DateStatus)[keyof typeof DateStatus];

export interface StatementPeriod {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Build a period from two dates, rejecting start > end.
 */
export function createStatementPeriod(start: Date, end: Date): StatementPeriod {
  if (compareCalendarDates(start, end) > 0) {
    throw new ConversionError(
      'INVALID_PERIOD',
      `Statement period start ${formatIsoDate(start)} is after end ${formatIsoDate(end)}`,
      { field: 'period', raw: `${formatIsoDate(start)}..${formatIsoDate(end)}` }
    );
  }
  return { start: new Date(start.getTime()), end: new Date(end.getTime()) };
}

function parsePeriodBoundary(value: string, field: 'start' | 'end'): Date {
  const parsed = parseStatementDate(value);
  if (parsed === null) {
    throw new ConversionError('INVALID_PERIOD', `Unrecognized ${field} date: ${value}`, {
      field: `period.${field}`,
      raw: value,
    });
  }
  return parsed;
}

export class PeriodValidator {
  readonly period: StatementPeriod;

  constructor(startDate: string, endDate: string) {
    this.period = createStatementPeriod(
      parsePeriodBoundary(startDate, 'start'),
      parsePeriodBoundary(endDate, 'end')
    );
  }

  static fromPeriod(period: StatementPeriod): PeriodValidator {
    return new PeriodValidator(formatIsoDate(period.start), formatIsoDate(period.end));
  }

  get start(): Date {
    return new Date(this.period.start.getTime());
  }

  get end(): Date {
    return new Date(this.period.end.getTime());
  }

  status(date: Date): DateStatus {
    if (compareCalendarDates(date, this.period.start) < 0) {
      return DateStatus.Before;
    }
    if (compareCalendarDates(date, this.period.end) > 0) {
      return DateStatus.After;
    }
    return DateStatus.Within;
  }

  contains(date: Date): boolean {
    return this.status(date) === DateStatus.Within;
  }

  /**
   * Clamp a date into the period: before → start, after → end, else unchanged.
   */
  clamp(date: Date): Date {
    switch (this.status(date)) {
      case DateStatus.Before:
        return this.start;
      case DateStatus.After:
        return this.end;
      case DateStatus.Within:
        return date;
    }
  }
}
