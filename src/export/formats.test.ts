import { describe, it, expect } from 'vitest';
import { formatCurrency, formatDate, formatTimestamp, generateCSV } from './formats';

describe('generateCSV', () => {
  it('joins rows with a trailing newline', () => {
    expect(generateCSV([['a', 1], ['b', 2.5]])).toBe('a,1\nb,2.5\n');
  });

  it('quotes fields with delimiters, quotes or newlines', () => {
    expect(generateCSV([['x,y', 'say "hi"', 'two\nlines']])).toBe('"x,y","say ""hi""","two\nlines"\n');
  });

  it('writes null and undefined as empty cells', () => {
    expect(generateCSV([[null, undefined, true]])).toBe(',,true\n');
  });

  it('returns an empty string for no rows', () => {
    expect(generateCSV([])).toBe('');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as YYYY-MM-DD HH:mm', () => {
    expect(formatTimestamp(new Date(2025, 2, 7, 9, 5, 59))).toBe('2025-03-07 09:05');
  });
});

describe('formatDate', () => {
  it('formats iso and short dates', () => {
    const date = new Date(2025, 10, 3);
    expect(formatDate(date)).toBe('2025-11-03');
    expect(formatDate(date, 'short')).toBe('11/03');
  });

  it('returns empty for an invalid date', () => {
    expect(formatDate(new Date(Number.NaN))).toBe('');
  });
});

describe('formatCurrency', () => {
  it('formats dollars with grouping', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(-3)).toBe('-$3.00');
  });

  it('shows a dash for missing amounts', () => {
    expect(formatCurrency(null)).toBe('-');
  });
});
