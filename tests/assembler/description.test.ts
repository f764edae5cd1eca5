import { describe, it, expect } from 'vitest';
import { buildDescription } from '@csv2ofx/assembler';
import { createRow } from '../helpers/index.js';

describe('buildDescription', () => {
  const row = createRow(['2025-10-01', '-10.00', ' Coffee ', '', 'Downtown', 'Card 1234']);

  it('should use a single column trimmed', () => {
    expect(buildDescription(row, [2], 'space', 'Transaction')).toBe('Coffee');
  });

  it('should join columns with the chosen separator, skipping blanks', () => {
    expect(buildDescription(row, [2, 3, 4], 'space', 'Transaction')).toBe('Coffee Downtown');
    expect(buildDescription(row, [2, 4, 5], 'dash', 'Transaction')).toBe('Coffee - Downtown - Card 1234');
    expect(buildDescription(row, [4, 2], 'comma', 'Transaction')).toBe('Downtown, Coffee');
    expect(buildDescription(row, [2, null, 5], 'pipe', 'Transaction')).toBe('Coffee | Card 1234');
  });

  it('should fall back to the placeholder when every column is blank', () => {
    expect(buildDescription(row, [3], 'space', 'Transaction')).toBe('Transaction');
    expect(buildDescription(row, [null], 'space', 'Sem descrição')).toBe('Sem descrição');
  });

  it('should truncate to 255 characters', () => {
    const long = createRow(['x'.repeat(200), 'y'.repeat(200)]);
    const description = buildDescription(long, [0, 1], 'space', 'Transaction');
    expect(description).toHaveLength(255);
    expect(description).toBe(`${'x'.repeat(200)} ${'y'.repeat(54)}`);
  });

  it('should not split a surrogate pair when truncating', () => {
    const emoji = createRow([`${'a'.repeat(254)}😀😀`]);
    expect(buildDescription(emoji, [0], 'space', 'Transaction')).toBe(`${'a'.repeat(254)}😀`);
  });
});
