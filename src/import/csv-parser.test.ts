import { describe, it, expect } from 'vitest';
import { cell, detectDelimiter, parseCsv } from './csv-parser';
import { generateCSV } from '../export/formats';

describe('parseCsv', () => {
  it('splits rows and cells', () => {
    expect(parseCsv('a,b,c\n1,2,3\n')).toEqual([
      ['a', 'b', 'c'],
      ['1', '2', '3'],
    ]);
  });

  it('keeps the last row without a trailing newline', () => {
    expect(parseCsv('a,b\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('keeps blank lines as empty rows so row numbers line up', () => {
    expect(parseCsv('h\n\nx\n')).toEqual([['h'], [''], ['x']]);
  });

  it('handles quoted delimiters, quotes and newlines', () => {
    expect(parseCsv('"a,b","say ""hi""","line1\nline2"\n')).toEqual([['a,b', 'say "hi"', 'line1\nline2']]);
  });

  it('strips a BOM and normalizes CRLF', () => {
    expect(parseCsv('\uFEFFa,b\r\n1,2\r\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('detects tab-separated input', () => {
    expect(parseCsv('a\tb, c\n1\t2\n')).toEqual([
      ['a', 'b, c'],
      ['1', '2'],
    ]);
  });

  it('honours an explicit delimiter', () => {
    expect(parseCsv('a\tb,c\n', { delimiter: 'comma' })).toEqual([['a\tb', 'c']]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('reads back what generateCSV writes', () => {
    const grid = [
      ['No', 'Name'],
      ['1', 'Widget, "deluxe"'],
      ['2', ''],
    ];
    expect(parseCsv(generateCSV(grid))).toEqual(grid);
  });
});

describe('detectDelimiter', () => {
  it('prefers comma on a tie', () => {
    expect(detectDelimiter('a,b\tc\n')).toBe(',');
  });

  it('ignores delimiters inside quotes', () => {
    expect(detectDelimiter('"a,b,c"\tx\ty\n')).toBe('\t');
  });
});

describe('cell', () => {
  it('trims and defaults missing cells to empty', () => {
    expect(cell(['  x  '], 0)).toBe('x');
    expect(cell(['x'], 3)).toBe('');
    expect(cell(undefined, 0)).toBe('');
  });
});
