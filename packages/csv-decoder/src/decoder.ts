/**
 * CSV decoding.
 *
 * Turns raw CSV bytes into a header list plus ordered rows. The delimiter is
 * supplied by the caller; nothing is sniffed. The first record is the header,
 * and every later record must have exactly as many fields as the header.
 * Quotes inside an unquoted field are kept as literal text.
 */

import { CsvError, parse } from 'csv-parse/sync';
import { z } from 'zod';
import {
  ConversionError,
  DELIMITER_CHARS,
  type DecodedTable,
  type Delimiter,
  type RawRow,
} from '@csv2ofx/types';

const UTF8_BOM = '\uFEFF';

/**
 * Shape of csv-parse output with `info: true`.
 */
const ParsedRecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({
      lines: z.number().int(),
    }),
  })
);

function toText(input: Uint8Array | string): string {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
  return text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
}

function lineFromCsvError(error: CsvError): number | undefined {
  const lines: unknown = error['lines'];
  return typeof lines === 'number' ? lines : undefined;
}

function parseRecords(text: string, delimiter: Delimiter): z.infer<typeof ParsedRecordsSchema> {
  try {
    const parsed: unknown = parse(text, {
      delimiter: DELIMITER_CHARS[delimiter],
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
    return ParsedRecordsSchema.parse(parsed);
  } catch (error) {
    if (error instanceof CsvError) {
      const line = lineFromCsvError(error);
      throw new ConversionError('MALFORMED_ROW', `Malformed CSV${line !== undefined ? ` at line ${line}` : ''}: ${error.message}`, {
        line,
      });
    }
    throw error;
  }
}

/**
 * Decode CSV bytes into headers and rows.
 *
 * @throws ConversionError HEADER_MISSING when the input has no records,
 *         MALFORMED_ROW when a row's field count differs from the header's
 */
export function decodeCsv(input: Uint8Array | string, delimiter: Delimiter): DecodedTable {
  const records = parseRecords(toText(input), delimiter);

  const [headerRecord, ...dataRecords] = records;
  if (headerRecord === undefined) {
    throw new ConversionError('HEADER_MISSING', 'CSV file is empty', { line: 1 });
  }

  const headers = headerRecord.record.map((name) => name.trim());
  if (headers.every((name) => name === '')) {
    throw new ConversionError('HEADER_MISSING', 'CSV file has no headers', { line: headerRecord.info.lines });
  }

  const rows: RawRow[] = dataRecords.map(({ record, info }, index) => {
    if (record.length !== headers.length) {
      throw new ConversionError(
        'MALFORMED_ROW',
        `Line ${info.lines} has ${record.length} fields, expected ${headers.length}`,
        { row: index, line: info.lines }
      );
    }

    const values: Record<string, string> = {};
    headers.forEach((name, column) => {
      values[name] = record[column] ?? '';
    });

    return { index, line: info.lines, fields: record, values };
  });

  return { headers, rows };
}
