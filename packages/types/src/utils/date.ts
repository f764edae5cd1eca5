import { compareAsc, format, isValid, parse, startOfDay } from 'date-fns';

/**
 * Supported input date layouts, tried in order. Each layout is paired with
 * a shape check so a two-digit year or stray characters never slip through.
 * DD/MM/YYYY is tried before MM/DD/YYYY, so an ambiguous day-month pair
 * reads day first.
 */
export const SUPPORTED_DATE_FORMATS = [
  { pattern: 'yyyy-MM-dd', shape: /^\d{4}-\d{1,2}-\d{1,2}$/ },
  { pattern: 'dd/MM/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: 'MM/dd/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: 'yyyy/MM/dd', shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/ },
  { pattern: 'dd-MM-yyyy', shape: /^\d{1,2}-\d{1,2}-\d{4}$/ },
  { pattern: 'dd.MM.yyyy', shape: /^\d{1,2}\.\d{1,2}\.\d{4}$/ },
  { pattern: 'yyyyMMdd', shape: /^\d{8}$/ },
] as const;

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a date string in any supported layout into a local-midnight Date.
 * Calendar-impossible dates (31/02/2025, 29/02/2025) are rejected.
 */
export function parseStatementDate(value: string): Date | null {
  const trimmed = value.trim();

  for (const { pattern, shape } of SUPPORTED_DATE_FORMATS) {
    if (!shape.test(trimmed)) {
      continue;
    }
    const parsed = parse(trimmed, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }

  return null;
}

/** YYYYMMDD, as used by DTPOSTED/DTSTART/DTEND and FITID hashing. */
export function formatOfxDate(date: Date): string {
  return format(date, 'yyyyMMdd');
}

/** YYYYMMDDHHMMSS, as used by DTSERVER. */
export function formatOfxDateTime(date: Date): string {
  return format(date, 'yyyyMMddHHmmss');
}

export function formatIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Calendar-day comparison; the time of day is ignored.
 */
export function compareCalendarDates(a: Date, b: Date): number {
  return compareAsc(startOfDay(a), startOfDay(b));
}
