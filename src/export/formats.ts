/**
 * Export Formats - CSV generation and formatting helpers for the catalog
 * sheet and console output.
 */

export type CellValue = string | number | boolean | null | undefined;

export interface CSVOptions {
  delimiter?: string;
  quoteChar?: string;
}

// =============================================================================
// CSV GENERATION
// =============================================================================

/**
 * Generate CSV text from rows. The result ends with a newline so appending a
 * row never joins it to the last line.
 */
export function generateCSV(rows: ReadonlyArray<ReadonlyArray<CellValue>>, options: CSVOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const quoteChar = options.quoteChar ?? '"';
  const quotePattern = new RegExp(quoteChar.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g');

  function escapeField(value: CellValue): string {
    if (value === null || value === undefined) {
      return '';
    }

    const str = String(value);

    // Quote if contains delimiter, quote char, or newline
    if (
      str.includes(delimiter) ||
      str.includes(quoteChar) ||
      str.includes('\n') ||
      str.includes('\r')
    ) {
      return `${quoteChar}${str.replace(quotePattern, quoteChar + quoteChar)}${quoteChar}`;
    }

    return str;
  }

  if (rows.length === 0) return '';
  return rows.map((row) => row.map(escapeField).join(delimiter)).join('\n') + '\n';
}

// =============================================================================
// FORMATTING HELPERS
// =============================================================================

/**
 * Format a number as currency (USD).
 */
export function formatCurrency(amount: number | null | undefined): string {
  if (amount === null || amount === undefined || !Number.isFinite(amount)) {
    return '-';
  }
  const abs = Math.abs(amount);
  const formatted = abs.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return amount < 0 ? `-$${formatted}` : `$${formatted}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local wall-clock timestamp, `YYYY-MM-DD HH:mm`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  );
}

/**
 * Format a date for different locales / formats.
 */
export function formatDate(date: Date, format: 'iso' | 'short' = 'iso'): string {
  if (isNaN(date.getTime())) {
    return '';
  }
  const year = date.getFullYear();
  const month = pad2(date.getMonth() + 1);
  const day = pad2(date.getDate());
  return format === 'short' ? `${month}/${day}` : `${year}-${month}-${day}`;
}
