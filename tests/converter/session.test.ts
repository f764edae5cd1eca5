import { describe, it, expect } from 'vitest';
import { ConversionSession, convertCsv } from '@csv2ofx/converter';
import { StatementSerializer } from '@csv2ofx/output';
import { ConversionError, formatIsoDate, parseConversionConfig } from '@csv2ofx/types';
import { captureError } from '../helpers/index.js';
import { createRecord, tagValues } from '../helpers/records.js';

const CSV = [
  'Date,Amount,Description',
  '2025-10-03,-50.00,Dinner',
  '2025-10-01,30.00,Refund',
  '2025-10-07,-5.25,Parking',
].join('\n');

const startSession = (config: Record<string, unknown> = {}): ConversionSession => {
  const result = convertCsv(CSV, {
    columns: { date: 0, amount: 1, description: [2] },
    accountId: 'ACC-1',
    initialBalance: '100.00',
    ...config,
  });
  if (!result.success) {
    throw new Error(result.message);
  }
  return result.session;
};

describe('ConversionSession', () => {
  it('should summarise the assembled records', () => {
    expect(startSession().summary()).toEqual({
      initial: 10000,
      totalDebits: 5525,
      totalCredits: 3000,
      final: 7475,
      count: 3,
    });
  });

  it('should drop deleted records from the summary and the document', () => {
    const session = startSession();
    session.setDeleted(0, true);

    expect(session.records[0]?.deleted).toBe(true);
    expect(session.summary()).toMatchObject({ totalDebits: 525, final: 12475, count: 2 });
    expect(tagValues(session.render(), 'MEMO')).toEqual(['Refund', 'Parking']);
  });

  it('should restore every deleted record', () => {
    const session = startSession();
    session.setDeleted(0, true);
    session.setDeleted(2, true);
    session.restoreAll();

    expect(session.records.every((record) => !record.deleted)).toBe(true);
    expect(session.summary().count).toBe(3);
  });

  it('should derive the period from the remaining records', () => {
    const session = startSession();
    expect(session.period()).toEqual({ start: new Date(2025, 9, 1), end: new Date(2025, 9, 7) });

    session.setDeleted(2, true);
    const period = session.period();
    expect(period === null ? null : formatIsoDate(period.end)).toBe('2025-10-03');
  });

  it('should prefer the configured period', () => {
    const session = startSession({ period: { start: '2025-10-01', end: '2025-10-31' } });
    expect(tagValues(session.render(), 'DTEND')).toEqual(['20251031']);
  });

  it('should render with the configured statement details', () => {
    const session = startSession({ bankName: 'Test Bank', currency: 'usd', finalBalance: '80.00', language: 'ENG' });
    const ofx = session.render({ generatedAt: new Date(2025, 10, 1, 8, 0, 0) });

    expect(tagValues(ofx, 'ORG')).toEqual(['Test Bank']);
    expect(tagValues(ofx, 'CURDEF')).toEqual(['USD']);
    expect(tagValues(ofx, 'LANGUAGE')).toEqual(['ENG']);
    expect(tagValues(ofx, 'DTSERVER')).toEqual(['20251101080000']);
    expect(tagValues(ofx, 'BALAMT')).toEqual(['80.00', '100.00']);
  });

  it('should not change the records when rendering', () => {
    const session = startSession();
    expect(session.render()).toBe(session.render());
    expect(session.records.map((r) => r.description)).toEqual(['Dinner', 'Refund', 'Parking']);
  });

  it('should fail to render without any period', () => {
    const config = parseConversionConfig({ columns: { date: 0, amount: 1, description: [2] } });
    const serializer = new StatementSerializer();
    serializer.add(createRecord({ deleted: true }));
    const session = new ConversionSession(serializer, config, null);

    expect(session.period()).toBeNull();
    const error = captureError(() => session.render());
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ code: 'MISSING_REQUIRED_FIELD', context: { field: 'period' } });
  });
});
