/**
 * CSV Export
 *
 * Writes a table as delimited text: header line, then one line per row.
 */

import type { CellValue, Table } from '../types';

export interface CsvOptions {
  /** Field delimiter (default "|") */
  delimiter: string;
}

const DEFAULT_OPTIONS: CsvOptions = {
  delimiter: '|',
};

/**
 * Text of one cell: null is empty, geometries are GeoJSON
 */
function formatCell(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Escape a CSV field value
 *
 * Fields containing the delimiter, quotes or a line break are wrapped in
 * quotes, with inner quotes doubled.
 */
export function escapeField(value: string, delimiter: string): string {
  const needsEscaping =
    value.includes('"') ||
    value.includes(delimiter) ||
    value.includes('\n') ||
    value.includes('\r');

  if (needsEscaping) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

/**
 * Serialise a table as CSV
 */
export function tableToCsv(table: Table, options: Partial<CsvOptions> = {}): string {
  const { delimiter } = { ...DEFAULT_OPTIONS, ...options };
  if (delimiter.length === 0 || /["\r\n]/.test(delimiter)) {
    throw new Error(`Invalid CSV delimiter: ${JSON.stringify(delimiter)}`);
  }

  const lines = [table.columns.map((column) => escapeField(column, delimiter)).join(delimiter)];
  for (const row of table.rows) {
    lines.push(
      table.columns
        .map((column) => escapeField(formatCell(row[column] ?? null), delimiter))
        .join(delimiter)
    );
  }

  return lines.join('\n') + '\n';
}
