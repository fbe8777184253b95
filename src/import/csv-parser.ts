/**
 * CSV Parser - parse a CSV/TSV sheet into a grid of string cells.
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab)
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters, newlines and escaped quotes ("")
 *
 * Row positions are preserved: grid[0] is sheet row 1, and blank lines stay
 * in the grid as empty rows so row numbers keep matching the sheet.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('csv-parser');

export type Delimiter = 'auto' | 'comma' | 'tab';

export interface ParseOptions {
  delimiter?: Delimiter;
}

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
};

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

/**
 * Count unquoted delimiters on the first few lines. Tab wins only when it
 * appears more often than comma.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split('\n').slice(0, 10).filter(Boolean);
  if (sampleLines.length === 0) return ',';

  function score(delim: string): number {
    let total = 0;
    for (const line of sampleLines) {
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') inQuotes = !inQuotes;
        else if (ch === delim && !inQuotes) total++;
      }
    }
    return total;
  }

  return score('\t') > score(',') ? '\t' : ',';
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

function normalize(text: string): string {
  const data = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Parse CSV text into rows of cells. Cells are kept verbatim (no trimming)
 * apart from quote removal. A single trailing newline does not add a row.
 */
export function parseCsv(csvData: string, options: ParseOptions = {}): string[][] {
  const data = normalize(csvData);
  if (data.length === 0) return [];

  const delimiterOption = options.delimiter ?? 'auto';
  const delimiter = delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < data.length) {
    const ch = data[i];

    if (inQuotes) {
      if (ch === '"') {
        if (data[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.length === 0) {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(current);
      current = '';
    } else if (ch === '\n') {
      row.push(current);
      rows.push(row);
      row = [];
      current = '';
    } else {
      current += ch;
    }
    i++;
  }

  if (inQuotes) {
    logger.warn({ row: rows.length + 1 }, 'Unterminated quoted field at end of input');
  }

  // Text without a trailing newline leaves the last row open
  if (current.length > 0 || row.length > 0) {
    row.push(current);
    rows.push(row);
  }

  logger.debug({ rows: rows.length, delimiter: delimiter === '\t' ? 'tab' : delimiter }, 'Parsed CSV');
  return rows;
}

/** Cell text trimmed; '' for a missing cell. */
export function cell(row: readonly string[] | undefined, index: number): string {
  return row?.[index]?.trim() ?? '';
}
