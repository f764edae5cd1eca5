import {
  DESCRIPTION_SEPARATOR_STRINGS,
  MAX_DESCRIPTION_LENGTH,
  type DescriptionSeparator,
  type RawRow,
} from '@csv2ofx/types';

/**
 * Join the trimmed, non-empty values of the selected columns.
 *
 * Falls back to `placeholder` when every selected value is blank, and
 * truncates the result to 255 code points.
 */
export function buildDescription(
  row: RawRow,
  columns: ReadonlyArray<number | null>,
  separator: DescriptionSeparator,
  placeholder: string
): string {
  const parts: string[] = [];
  for (const column of columns) {
    if (column === null) {
      continue;
    }
    const value = row.fields[column]?.trim() ?? '';
    if (value !== '') {
      parts.push(value);
    }
  }

  const description = parts.length > 0 ? parts.join(DESCRIPTION_SEPARATOR_STRINGS[separator]) : placeholder;
  return Array.from(description).slice(0, MAX_DESCRIPTION_LENGTH).join('');
}
