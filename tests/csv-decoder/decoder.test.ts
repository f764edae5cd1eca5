import { describe, it, expect } from 'vitest';
import { decodeCsv } from '@csv2ofx/csv-decoder';
import { ConversionError } from '@csv2ofx/types';
import { captureError } from '../helpers/index.js';

describe('decodeCsv', () => {
  it('should split the header from the data rows', () => {
    const table = decodeCsv('Date,Amount,Memo\n2025-10-01,-100.50,Grocery\n2025-10-02,20.00,Refund\n', 'comma');

    expect(table.headers).toEqual(['Date', 'Amount', 'Memo']);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]).toEqual({
      index: 0,
      line: 2,
      fields: ['2025-10-01', '-100.50', 'Grocery'],
      values: { Date: '2025-10-01', Amount: '-100.50', Memo: 'Grocery' },
    });
    expect(table.rows[1]?.index).toBe(1);
    expect(table.rows[1]?.line).toBe(3);
  });

  it('should use the configured delimiter', () => {
    const table = decodeCsv('Data;Valor;Descricao\n01/10/2025;-100,50;Mercado', 'semicolon');

    expect(table.headers).toEqual(['Data', 'Valor', 'Descricao']);
    expect(table.rows[0]?.fields).toEqual(['01/10/2025', '-100,50', 'Mercado']);
  });

  it('should decode tab and pipe delimited files', () => {
    expect(decodeCsv('A\tB\n1\t2', 'tab').rows[0]?.fields).toEqual(['1', '2']);
    expect(decodeCsv('A|B\n1|2', 'pipe').rows[0]?.fields).toEqual(['1', '2']);
  });

  it('should keep delimiters inside quoted fields', () => {
    const table = decodeCsv('Date,Memo\n2025-10-01,"Coffee, large"\n', 'comma');
    expect(table.rows[0]?.values['Memo']).toBe('Coffee, large');
  });

  it('should keep quotes inside an unquoted field as text', () => {
    const table = decodeCsv('Date,Amount,Description\n2025-10-01,-5.00,Joe\'s "Diner"\n2025-10-02,-1.00,Ok\n', 'comma');

    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]?.fields).toEqual(['2025-10-01', '-5.00', 'Joe\'s "Diner"']);
  });

  it('should strip a UTF-8 byte order mark', () => {
    const table = decodeCsv('\uFEFFDate,Amount\n2025-10-01,1.00', 'comma');
    expect(table.headers[0]).toBe('Date');
  });

  it('should accept raw bytes', () => {
    const bytes = new TextEncoder().encode('Date,Memo\n2025-10-01,Café');
    expect(decodeCsv(bytes, 'comma').rows[0]?.values['Memo']).toBe('Café');
  });

  it('should trim header names', () => {
    const table = decodeCsv(' Date , Amount \n2025-10-01,1.00', 'comma');
    expect(table.headers).toEqual(['Date', 'Amount']);
    expect(table.rows[0]?.values['Amount']).toBe('1.00');
  });

  it('should skip blank lines', () => {
    const table = decodeCsv('Date,Amount\n\n2025-10-01,1.00\n\n', 'comma');
    expect(table.rows).toHaveLength(1);
  });

  it('should decode a header-only file to no rows', () => {
    expect(decodeCsv('Date,Amount\n', 'comma').rows).toEqual([]);
  });

  it('should reject an empty file', () => {
    const error = captureError(() => decodeCsv('', 'comma'));
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ code: 'HEADER_MISSING', message: 'CSV file is empty' });
  });

  it('should reject a header of blank names', () => {
    expect(captureError(() => decodeCsv(' , \n1,2', 'comma'))).toMatchObject({
      code: 'HEADER_MISSING',
      message: 'CSV file has no headers',
    });
  });

  it('should reject rows whose field count differs from the header', () => {
    const error = captureError(() => decodeCsv('A,B\n1,2\n3\n', 'comma'));
    expect(error).toMatchObject({
      code: 'MALFORMED_ROW',
      message: 'Line 3 has 1 fields, expected 2',
      context: { row: 1, line: 3 },
    });
  });

  it('should report an unterminated quote as a malformed row', () => {
    expect(captureError(() => decodeCsv('A,B\n"1,2\n', 'comma'))).toMatchObject({ code: 'MALFORMED_ROW' });
  });
});
